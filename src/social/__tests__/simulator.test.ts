import { describe, it, expect } from 'vitest';
import { SocialMediaSimulator } from '../simulator';
import { DEFAULT_PROFILE, getPlatformProfile, PLATFORMS } from '../platforms';
import { isAggregate } from '../../models';
import { localDate } from '../../__tests__/helpers';

const postedAt = localDate(2024, 1, 1, 9);
const scheduled = localDate(2024, 1, 2, 9);

function midpointSimulator() {
  return new SocialMediaSimulator({ random: () => 0.5, now: () => postedAt });
}

describe('SocialMediaSimulator.postToPlatform', () => {
  it('derives metrics from the platform profile', () => {
    const sim = midpointSimulator();
    const post = sim.postToPlatform('LinkedIn', 'Hello LinkedIn', scheduled);

    expect(post.metrics).toEqual({
      reach: 10000,
      engagements: 250,
      likes: 175,
      comments: 50,
      shares: 25,
      clicks: 50,
      conversions: 2
    });
    expect(post.status).toBe('live');
    expect(post.platform).toBe('LinkedIn');
    expect(post.postedAt).toBe(postedAt);
    expect(post.scheduledTime).toBe(scheduled);
    expect(post.postId).toMatch(/^LinkedIn_\d+_[A-Za-z0-9_-]{6}$/);
  });

  it('uses the default profile for unknown platforms', () => {
    const sim = midpointSimulator();
    const post = sim.postToPlatform('Mastodon', 'toot', scheduled);

    expect(getPlatformProfile('Mastodon')).toBe(DEFAULT_PROFILE);
    expect(post.metrics.reach).toBe(5000);
    expect(post.metrics.engagements).toBe(150);
    expect(post.metrics.clicks).toBe(30);
    expect(post.metrics.conversions).toBe(1);
  });

  it('applies the lower bound of every draw', () => {
    const sim = new SocialMediaSimulator({ random: () => 0 });
    const { metrics } = sim.postToPlatform('LinkedIn', 'x', scheduled);

    expect(metrics.reach).toBe(8000);
    expect(metrics.engagements).toBe(140);
    expect(metrics.clicks).toBe(14);
    expect(metrics.conversions).toBe(0);
  });

  it('truncates the content preview to 100 characters', () => {
    const sim = midpointSimulator();
    const post = sim.postToPlatform('Twitter', 'a'.repeat(150), scheduled);
    expect(post.contentPreview).toBe('a'.repeat(100));
  });

  it('counts an emoji as one character in the preview', () => {
    const sim = midpointSimulator();
    const post = sim.postToPlatform('Twitter', `${'a'.repeat(99)}🎉 party`, scheduled);
    expect(post.contentPreview).toBe(`${'a'.repeat(99)}🎉`);

    const ack = sim.schedulePost('Twitter', `🚀${'b'.repeat(120)}`, scheduled);
    expect(ack.contentPreview).toBe(`🚀${'b'.repeat(99)}`);
  });

  it('splits engagements into likes, comments and shares within rounding', () => {
    const sim = new SocialMediaSimulator();
    for (let i = 0; i < 50; i++) {
      const platform = PLATFORMS[i % PLATFORMS.length];
      const { metrics } = sim.postToPlatform(platform, 'content', scheduled);
      const split = metrics.likes + metrics.comments + metrics.shares;
      expect(Math.abs(split - metrics.engagements)).toBeLessThanOrEqual(1);
    }
    expect(sim.history).toHaveLength(50);
  });
});

describe('SocialMediaSimulator.schedulePost', () => {
  it('acknowledges without touching history', () => {
    const sim = midpointSimulator();
    const when = new Date('2024-03-01T12:00:00.000Z');
    const ack = sim.schedulePost('TikTok', 'soon', when);

    expect(ack).toEqual({
      platform: 'TikTok',
      status: 'scheduled',
      contentPreview: 'soon',
      scheduledTime: when,
      message: 'Post scheduled on TikTok for 2024-03-01T12:00:00.000Z'
    });
    expect(sim.history).toHaveLength(0);
  });
});

describe('SocialMediaSimulator analytics', () => {
  it('returns the zero record for every platform without history', () => {
    const sim = new SocialMediaSimulator();
    for (const platform of PLATFORMS) {
      expect(sim.getPlatformAnalytics(platform)).toEqual({ platform, posts: 0, totalReach: 0 });
    }
  });

  it('covers all five built-in platforms when nothing was posted', () => {
    const all = new SocialMediaSimulator().getAllAnalytics();
    expect(Object.keys(all)).toEqual(['LinkedIn', 'Twitter', 'Instagram', 'Facebook', 'TikTok']);
    for (const entry of Object.values(all)) {
      expect(isAggregate(entry)).toBe(false);
      expect(entry.totalReach).toBe(0);
    }
  });

  it('aggregates totals and rates per platform', () => {
    const sim = midpointSimulator();
    sim.postToPlatform('LinkedIn', 'one', scheduled);
    sim.postToPlatform('LinkedIn', 'two', scheduled);
    sim.postToPlatform('Twitter', 'three', scheduled);

    const linkedin = sim.getPlatformAnalytics('LinkedIn');
    if (!isAggregate(linkedin)) throw new Error('expected aggregate analytics');

    expect(linkedin.postsCount).toBe(2);
    expect(linkedin.totalReach).toBe(20000);
    expect(linkedin.totalEngagements).toBe(500);
    expect(linkedin.totalClicks).toBe(100);
    expect(linkedin.totalConversions).toBe(4);
    expect(linkedin.avgEngagementRate).toBeCloseTo(2.5);
    expect(linkedin.ctr).toBeCloseTo(0.5);
    expect(linkedin.conversionRate).toBeCloseTo(4);

    const all = sim.getAllAnalytics();
    expect(isAggregate(all.Twitter)).toBe(true);
    expect(all.Instagram).toEqual({ platform: 'Instagram', posts: 0, totalReach: 0 });
  });
});
