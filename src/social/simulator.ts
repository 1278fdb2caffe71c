import { nanoid } from 'nanoid';
import {
  AnalyticsByPlatform,
  Platform,
  PlatformAnalytics,
  PostRecord,
  ScheduledPostAck,
  SimulatedPostMetrics
} from '../models';
import { getPlatformProfile, PLATFORMS } from './platforms';
import { truncateChars } from '../text';

export interface SimulatorOptions {
  random?: () => number; // [0, 1)
  now?: () => Date;
}


// Stands in for the real networks: every post goes "live" with fabricated numbers.
export class SocialMediaSimulator {
  private readonly posts: PostRecord[] = [];
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(opts: SimulatorOptions = {}) {
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => new Date());
  }

  get history(): readonly PostRecord[] {
    return this.posts;
  }

  private uniform(min: number, max: number) {
    return min + this.random() * (max - min);
  }

  private simulateMetrics(platform: Platform): SimulatedPostMetrics {
    const { baseReach, engagementRate } = getPlatformProfile(platform);
    const reach = Math.round(baseReach * this.uniform(0.8, 1.2));
    const engagements = Math.round(reach * engagementRate * this.uniform(0.7, 1.3));
    const clicks = Math.round(engagements * 0.2 * this.uniform(0.5, 1.5));
    const conversions = Math.round(clicks * 0.05 * this.uniform(0.3, 1.3));
    return {
      reach,
      engagements,
      likes: Math.round(engagements * 0.7),
      comments: Math.round(engagements * 0.2),
      shares: Math.round(engagements * 0.1),
      clicks,
      conversions
    };
  }

  postToPlatform(platform: Platform, content: string, scheduledTime: Date): PostRecord {
    const postedAt = this.now();
    const record: PostRecord = {
      postId: `${platform}_${postedAt.getTime()}_${nanoid(6)}`,
      platform,
      contentPreview: truncateChars(content, 100),
      postedAt,
      scheduledTime,
      status: 'live',
      metrics: this.simulateMetrics(platform)
    };
    this.posts.push(record);
    return record;
  }

  // Acknowledges a future post without recording it.
  schedulePost(platform: Platform, content: string, scheduledTime: Date): ScheduledPostAck {
    return {
      platform,
      status: 'scheduled',
      contentPreview: truncateChars(content, 100),
      scheduledTime,
      message: `Post scheduled on ${platform} for ${scheduledTime.toISOString()}`
    };
  }

  getPlatformAnalytics(platform: Platform): PlatformAnalytics {
    const platformPosts = this.posts.filter((p) => p.platform === platform);
    if (!platformPosts.length) return { platform, posts: 0, totalReach: 0 };

    let totalReach = 0;
    let totalEngagements = 0;
    let totalClicks = 0;
    let totalConversions = 0;
    for (const { metrics } of platformPosts) {
      totalReach += metrics.reach;
      totalEngagements += metrics.engagements;
      totalClicks += metrics.clicks;
      totalConversions += metrics.conversions;
    }

    return {
      platform,
      postsCount: platformPosts.length,
      totalReach,
      totalEngagements,
      avgEngagementRate: totalReach > 0 ? (totalEngagements / totalReach) * 100 : 0,
      totalClicks,
      totalConversions,
      ctr: totalReach > 0 ? (totalClicks / totalReach) * 100 : 0,
      conversionRate: totalClicks > 0 ? (totalConversions / totalClicks) * 100 : 0
    };
  }

  // Covers every built-in platform, including ones never posted to.
  getAllAnalytics(): AnalyticsByPlatform {
    const analytics: AnalyticsByPlatform = {};
    for (const platform of PLATFORMS) {
      analytics[platform] = this.getPlatformAnalytics(platform);
    }
    return analytics;
  }
}
