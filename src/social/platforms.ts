import { ContentTemplate, Platform, PlatformProfile, PlatformStrategy } from '../models';

export const PLATFORMS: readonly Platform[] = ['LinkedIn', 'Twitter', 'Instagram', 'Facebook', 'TikTok'];

// Used for any platform missing from the table below.
export const DEFAULT_PROFILE: PlatformProfile = { baseReach: 5000, engagementRate: 0.03 };

const PROFILES: Record<string, PlatformProfile> = {
  LinkedIn: { baseReach: 10000, engagementRate: 0.025, avgFollowers: 5000 },
  Twitter: { baseReach: 15000, engagementRate: 0.035, avgFollowers: 8000 },
  Instagram: { baseReach: 20000, engagementRate: 0.045, avgFollowers: 12000 },
  Facebook: { baseReach: 25000, engagementRate: 0.02, avgFollowers: 15000 },
  TikTok: { baseReach: 30000, engagementRate: 0.055, avgFollowers: 20000 }
};

const STRATEGY_DETAILS: Record<string, { frequency: string; contentType: string; kpis: string[] }> = {
  LinkedIn: {
    frequency: '3-4 times per week',
    contentType: 'Articles, thought leadership, company updates',
    kpis: ['Impressions', 'Engagement rate', 'Profile visits']
  },
  Twitter: {
    frequency: 'Daily (1-2 tweets)',
    contentType: 'News, hot takes, conversations, threads',
    kpis: ['Retweets', 'Likes', 'Replies']
  },
  Instagram: {
    frequency: '4-5 times per week',
    contentType: 'Reels, Stories, carousel posts, behind-the-scenes',
    kpis: ['Reach', 'Saves', 'Shares', 'Follower growth']
  },
  Facebook: {
    frequency: '3-4 times per week',
    contentType: 'Community posts, videos, events',
    kpis: ['Reach', 'Video views', 'Engagement']
  },
  TikTok: {
    frequency: 'Daily (2-3 videos)',
    contentType: 'Trends, challenges, educational content',
    kpis: ['Views', 'Watch time', 'Shares']
  }
};

const TEMPLATES: Record<string, ContentTemplate> = {
  LinkedIn: {
    characterLimit: 3000,
    tone: 'Professional, thought-leadership',
    contentTypes: ['Articles', 'Case studies', 'Industry insights', 'Company updates'],
    bestPostingTimes: 'Tuesday-Thursday, 7-9 AM'
  },
  Twitter: {
    characterLimit: 280,
    tone: 'Conversational, timely, trending',
    contentTypes: ['News', 'Updates', 'Threads', 'Questions'],
    bestPostingTimes: 'Monday-Friday, 8-10 AM & 5-6 PM'
  },
  Instagram: {
    characterLimit: 2200,
    tone: 'Visual, aspirational, engaging',
    contentTypes: ['Photos', 'Reels', 'Stories', 'Carousels'],
    bestPostingTimes: 'Monday-Friday, 11 AM - 1 PM'
  },
  Facebook: {
    characterLimit: 5000,
    tone: 'Community-focused, conversational',
    contentTypes: ['Stories', 'Videos', 'Links', 'Events'],
    bestPostingTimes: 'Thursday-Friday, 1-4 PM'
  },
  TikTok: {
    characterLimit: 150,
    tone: 'Trendy, authentic, entertaining',
    contentTypes: ['Trends', 'Challenges', 'Behind-the-scenes', 'Educational'],
    bestPostingTimes: 'Tuesday-Thursday, 6-10 PM'
  }
};

function lookup<T>(table: Record<string, T>, platform: Platform): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, platform) ? table[platform] : undefined;
}

export function isKnownPlatform(platform: string) {
  return PLATFORMS.includes(platform);
}

export function getPlatformProfile(platform: Platform): PlatformProfile {
  return lookup(PROFILES, platform) ?? DEFAULT_PROFILE;
}

export function getPlatformStrategy(platform: Platform, goal: string): PlatformStrategy {
  const details = lookup(STRATEGY_DETAILS, platform);
  return {
    postingFrequency: details?.frequency ?? 'Regular',
    contentType: details?.contentType ?? 'General',
    primaryKpis: details ? [...details.kpis] : [],
    goalAlignment: `Aligned with '${goal}'`
  };
}

export function getPlatformContentTemplate(platform: Platform): ContentTemplate | undefined {
  return lookup(TEMPLATES, platform);
}

// Sample copy for the built-in platforms; other platforms get none.
export function generatePlatformContent(platform: Platform, campaignName: string, audience: string): string | undefined {
  switch (platform) {
    case 'LinkedIn':
      return `🎯 ${campaignName}\nExciting announcement for our ${audience}! Learn more about how we're driving innovation. #LinkedInPost`;
    case 'Twitter':
      return `🚀 ${campaignName} is here! Perfect for ${audience}. Check it out now! #SocialMedia #Campaign`;
    case 'Instagram':
      return `✨ ${campaignName} is live! 🎉 Designed for ${audience} who want to stay ahead. Tap the link in bio! 📸 #InstagramReels`;
    case 'Facebook':
      return `📢 We're excited to introduce ${campaignName}! Created specifically for ${audience}. Join our community and discover more!`;
    case 'TikTok':
      return `POV: ${campaignName} just changed everything for ${audience} 🔥 #FYP #Trending #NewAnnouncement`;
    default:
      return undefined;
  }
}
