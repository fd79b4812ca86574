export { tgSendMessage, getTelegramConfig, sendAdvisoryReport } from './telegram.notifier.js';
export type { NotifyLogger, TelegramConfig, TgSendResult } from './telegram.notifier.js';
