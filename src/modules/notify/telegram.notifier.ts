/**
 * ADVISOR: Telegram Notifier (Admin Only)
 *
 * Sends the rendered advisory report to the admin chat. Alerts go out
 * only when ADVISOR_ALERTS_ENABLED is true and both credentials are set.
 */

import { env, type Env } from '../../config/env.js';
import { errorMessage } from '../../common/errors.js';
import { renderReportTelegramHtml } from '../advisor/advisory.renderer.js';
import type { AdvisoryReport } from '../advisor/advisory.types.js';

export interface NotifyLogger {
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

type TgSendOpts = {
  token: string;
  chatId: string;
  text: string;
  parseMode?: 'HTML' | 'MarkdownV2';
  disableWebPreview?: boolean;
};

export interface TgSendResult {
  ok: boolean;
  status: number;
  body?: unknown;
  error?: 'TG_SEND_FAILED' | 'TG_SEND_EXCEPTION';
}

export async function tgSendMessage(logger: NotifyLogger, opts: TgSendOpts): Promise<TgSendResult> {
  const url = `https://api.telegram.org/bot${opts.token}/sendMessage`;

  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        chat_id: opts.chatId,
        text: opts.text,
        parse_mode: opts.parseMode ?? 'HTML',
        disable_web_page_preview: opts.disableWebPreview ?? true,
      }),
    });

    const body: unknown = await res.json().catch(() => ({}));
    if (!res.ok) {
      logger.warn({ status: res.status, body }, 'TG send failed');
      return { ok: false, status: res.status, body, error: 'TG_SEND_FAILED' };
    }
    return { ok: true, status: res.status, body };
  } catch (e) {
    logger.error({ err: errorMessage(e) }, 'TG send exception');
    return { ok: false, status: 0, error: 'TG_SEND_EXCEPTION' };
  }
}

export interface TelegramConfig {
  token: string;
  chatId: string;
  alertsEnabled: boolean;
  enabled: boolean;
}

export function getTelegramConfig(
  source: Pick<Env, 'TG_BOT_TOKEN' | 'TG_ADMIN_CHAT_ID' | 'ADVISOR_ALERTS_ENABLED'> = env
): TelegramConfig {
  const alertsEnabled = source.ADVISOR_ALERTS_ENABLED;
  const hasCredentials = !!(source.TG_BOT_TOKEN && source.TG_ADMIN_CHAT_ID);

  return {
    token: source.TG_BOT_TOKEN ?? '',
    chatId: source.TG_ADMIN_CHAT_ID ?? '',
    alertsEnabled,
    enabled: alertsEnabled && hasCredentials,
  };
}

/** Renders and sends the report; null when alerts are off. */
export async function sendAdvisoryReport(
  report: AdvisoryReport,
  logger: NotifyLogger,
  config: TelegramConfig = getTelegramConfig()
): Promise<TgSendResult | null> {
  if (!config.enabled) return null;
  return tgSendMessage(logger, {
    token: config.token,
    chatId: config.chatId,
    text: renderReportTelegramHtml(report),
  });
}
