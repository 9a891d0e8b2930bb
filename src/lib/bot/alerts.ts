/**
 * Alerts — Telegram Bot Integration
 *
 * Sends notifications for hedge opens/closes, failed rollbacks, orphaned
 * positions and errors. Falls back to logging only if Telegram is not
 * configured.
 */

import type {
  AlertLevel,
  HedgeAlert,
  HedgeDirection,
  HedgeReport,
} from '@/types/funding-hedge';
import type { Logger } from './logger';

export class AlertManager {
  private botToken: string | undefined;
  private chatId: string | undefined;
  private enabled: boolean;
  private logger: Logger;
  private queue: HedgeAlert[] = [];
  private sending = false;

  constructor(logger: Logger, botToken?: string, chatId?: string) {
    this.logger = logger;
    this.botToken = botToken;
    this.chatId = chatId;
    this.enabled = !!(botToken && chatId);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  // ============================================
  // High-Level Alert Methods
  // ============================================

  async hedgeOpened(
    contractId: string,
    direction: HedgeDirection,
    futuresContracts: number,
    spotQuoteAmount: number,
    fundingRatePct: number,
  ): Promise<void> {
    await this.send({
      level: 'info',
      event: 'hedge_opened',
      message: [
        `Hedge opened: ${contractId} ${direction}`,
        `Rate: ${fundingRatePct.toFixed(4)}%`,
        `Futures: ${futuresContracts} contracts`,
        `Spot: $${spotQuoteAmount.toFixed(2)}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async hedgeClosed(report: HedgeReport): Promise<void> {
    await this.send({
      level: 'info',
      event: 'hedge_closed',
      message: [
        `Hedge closed: ${report.contractId} futures ${report.futuresSide}`,
        `Futures PnL: $${report.futuresPnl.toFixed(4)}`,
        `Spot PnL: $${report.spotPnl.toFixed(4)}`,
        `Total PnL: +$${report.totalPnl.toFixed(4)}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async rollbackFailed(contractId: string, reason: string): Promise<void> {
    await this.send({
      level: 'critical',
      event: 'rollback_failed',
      message: `MANUAL INTERVENTION: ${contractId} futures leg open without spot hedge\n${reason}`,
      timestamp: Date.now(),
    });
  }

  async unwindFailed(contractId: string, reason: string): Promise<void> {
    await this.send({
      level: 'critical',
      event: 'unwind_failed',
      message: `MANUAL INTERVENTION: ${contractId} unwind incomplete\n${reason}`,
      timestamp: Date.now(),
    });
  }

  async orphanedPosition(contractId: string, reason: string): Promise<void> {
    await this.send({
      level: 'warning',
      event: 'orphaned_position',
      message: `Orphaned position: ${contractId}\n${reason}`,
      timestamp: Date.now(),
    });
  }

  async botStarted(): Promise<void> {
    await this.send({
      level: 'info',
      event: 'bot_started',
      message: 'Funding hedge bot started',
      timestamp: Date.now(),
    });
  }

  async botStopped(reason: string): Promise<void> {
    await this.send({
      level: 'warning',
      event: 'bot_stopped',
      message: `Funding hedge bot stopped: ${reason}`,
      timestamp: Date.now(),
    });
  }

  async error(message: string, details?: Record<string, unknown>): Promise<void> {
    await this.send({
      level: 'error',
      event: 'error',
      message: `ERROR: ${message}`,
      details,
      timestamp: Date.now(),
    });
  }

  // ============================================
  // Core Send Logic
  // ============================================

  private async send(alert: HedgeAlert): Promise<void> {
    // Always log
    this.log(alert.level, `[${alert.event}] ${alert.message.replace(/\n/g, ' | ')}`);

    if (!this.enabled) return;

    this.queue.push(alert);
    await this.processQueue();
  }

  private log(level: AlertLevel, line: string): void {
    if (level === 'critical' || level === 'error') {
      this.logger.error(line);
    } else if (level === 'warning') {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
  }

  private async processQueue(): Promise<void> {
    if (this.sending) return;

    this.sending = true;
    try {
      let alert = this.queue.shift();
      while (alert) {
        await this.sendTelegram(alert);
        // Rate limit: max 1 msg per second
        await sleep(1000);
        alert = this.queue.shift();
      }
    } finally {
      this.sending = false;
    }
  }

  private async sendTelegram(alert: HedgeAlert): Promise<void> {
    if (!this.botToken || !this.chatId) return;

    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: alert.message,
        }),
      });

      if (!response.ok) {
        this.logger.warn(`Telegram API error: ${response.status} ${response.statusText}`);
      }
    } catch (err) {
      this.logger.warn('Telegram send failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
