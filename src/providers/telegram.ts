import { logger } from '../utils/logger.js';

const log = logger.createContext('telegram');

const TELEGRAM_API_BASE = 'https://api.telegram.org';

export interface Notifier {
  send(message: string): Promise<void>;
}

/**
 * Sends HTML-formatted messages to one chat through the Bot API
 */
export class TelegramNotifier implements Notifier {
  constructor(
    private botToken: string,
    private chatId: string
  ) {}

  async send(message: string): Promise<void> {
    const response = await fetch(`${TELEGRAM_API_BASE}/bot${this.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.chatId,
        text: message,
        parse_mode: 'HTML'
      })
    });

    if (!response.ok) {
      throw new Error(`Telegram error: ${response.status} ${await response.text()}`);
    }
    log.normal('Telegram message sent');
  }
}
