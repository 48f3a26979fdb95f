import { VideoRecord } from '../types/youtube.types.js';

export interface VideoMetrics {
  viralRatio: number;
  titleLength: number;
  isClickbait: 0 | 1;
}

/**
 * viralRatio is the log10 distance between the video's views and its channel's average views per video.
 */
export function calculateMetrics(video: VideoRecord): VideoMetrics {
  const avgViews = video.channelTotalViews / Math.max(video.channelVideoCount, 1);
  const viralRatio = Math.log10(video.views + 1) - Math.log10(avgViews + 1);

  const title = video.title;
  const capsCount = [...title].filter(char => char !== char.toLowerCase() && char === char.toUpperCase()).length;
  const shouting = title.length > 0 && capsCount / title.length > 0.5;
  const isClickbait = title.includes('!') || title.includes('?') || shouting ? 1 : 0;

  return {
    viralRatio,
    titleLength: title.length,
    isClickbait,
  };
}
