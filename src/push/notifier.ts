import type { Config } from '../shared/config.js';
import type { ReportContent } from '../report/markdown.js';
import { EmailNotifier } from './email.js';
import { TelegramNotifier } from './telegram.js';

export interface Notifier {
  readonly name: string;
  send(content: ReportContent): Promise<void>;
}

/** Every delivery channel enabled in config. */
export function createNotifiers(delivery: Config['delivery']): Notifier[] {
  const notifiers: Notifier[] = [];
  if (delivery.email.enabled) notifiers.push(new EmailNotifier(delivery.email));
  if (delivery.telegram.enabled) notifiers.push(new TelegramNotifier(delivery.telegram));
  return notifiers;
}
