import { WebClient, KnownBlock } from '@slack/web-api';
import { DatabaseInterface } from '../db/database.js';
import { RunStats } from '../types/run.types.js';
import { errorMessage } from '../utils/errors.js';

export interface SlackMessage {
  channel: string;
  text: string;
  blocks: KnownBlock[];
  unfurl_links: boolean;
  unfurl_media: boolean;
}

export interface SlackMessenger {
  postMessage(message: SlackMessage): Promise<{ ok?: boolean; ts?: string; error?: string }>;
}

export interface SlackPostResult {
  success: boolean;
  channelId?: string;
  timestamp?: string;
  error?: string;
}

export class SlackService {
  private messenger: SlackMessenger;

  constructor(token: string, private db: DatabaseInterface, messenger?: SlackMessenger) {
    if (messenger) {
      this.messenger = messenger;
    } else {
      const client = new WebClient(token);
      this.messenger = { postMessage: message => client.chat.postMessage(message) };
    }
  }

  /**
   * Post the run report to a channel, once per run
   */
  async sendRunReport(runStats: RunStats, channelId: string): Promise<SlackPostResult> {
    try {
      // Check for existing post to ensure idempotency
      const existing = await this.getExistingPost(runStats.runId, channelId);
      if (existing) {
        console.log(`📤 Report already sent to ${channelId} for run ${runStats.runId}`);
        return { success: true, channelId, timestamp: existing };
      }

      console.log(`📤 Sending run report to channel ${channelId}`);
      const result = await this.messenger.postMessage({
        channel: channelId,
        blocks: this.buildReportBlocks(runStats),
        text: this.buildReportText(runStats), // Fallback text
        unfurl_links: false,
        unfurl_media: false
      });

      if (result.ok && result.ts) {
        await this.savePostRecord(runStats.runId, channelId, result.ts);
        console.log(`✅ Report sent to ${channelId}`);
        return { success: true, channelId, timestamp: result.ts };
      }

      throw new Error(`Slack API error: ${result.error}`);

    } catch (error) {
      console.error(`❌ Failed to send report to ${channelId}:`, error);
      return {
        success: false,
        error: errorMessage(error)
      };
    }
  }

  buildReportText(runStats: RunStats): string {
    const icon = runStats.status === 'success' ? '✅' : '❌';
    return `${icon} Thumbnail collection ${runStats.status} • ${this.formatDate(runStats.startedAt)}`;
  }

  buildReportBlocks(runStats: RunStats): KnownBlock[] {
    const { stats } = runStats;
    const blocks: KnownBlock[] = [];

    blocks.push({
      type: 'header',
      text: {
        type: 'plain_text',
        text: this.buildReportText(runStats),
        emoji: true
      }
    });

    blocks.push({
      type: 'context',
      elements: [
        {
          type: 'mrkdwn',
          text: `📹 ${stats.videosFound} videos • ⬇️ ${stats.thumbnailsDownloaded} downloaded • ⚠️ ${stats.thumbnailsFailed} failed • 📊 current ${stats.currentCount}/${stats.batchLimit}`
        }
      ]
    });

    if (stats.batchesCreated.length > 0) {
      blocks.push({
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `*🔄 New batches:* ${stats.batchesCreated.map(name => `\`${name}\``).join(', ')}`
        }
      });
    }

    if (runStats.errors.length > 0) {
      blocks.push({
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `*Errors*\n${runStats.errors.map(error => `• ${this.truncateText(error, 300)}`).join('\n')}`
        }
      });
    }

    return blocks;
  }

  private formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
  }

  /**
   * Truncate text to avoid Slack Block Kit limits
   */
  private truncateText(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength - 3) + '...';
  }

  private async getExistingPost(runId: string, channelId: string): Promise<string | null> {
    const rows = await this.db.query(
      'SELECT thread_ts FROM slack_posts WHERE run_id = ? AND channel_id = ?',
      [runId, channelId]
    );
    const row = rows[0];
    if (typeof row === 'object' && row !== null && 'thread_ts' in row && typeof row.thread_ts === 'string') {
      return row.thread_ts;
    }
    return null;
  }

  /**
   * Save post record for idempotency
   */
  private async savePostRecord(runId: string, channelId: string, timestamp: string): Promise<void> {
    try {
      await this.db.run(`
        INSERT INTO slack_posts (run_id, channel_id, thread_ts, posted_at)
        VALUES (?, ?, ?, ?)
      `, [runId, channelId, timestamp, new Date().toISOString()]);
    } catch (error) {
      console.error('Error saving post record:', error);
    }
  }
}
