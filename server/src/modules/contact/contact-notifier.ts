import type { ContactMessage } from '@shared/types'
import { logger } from '../../logger'

/**
 * Outbound notification for a new, non-spam message. Delivery (SMTP, a mail
 * API, a chat webhook) lives behind this interface.
 */
export interface ContactNotifier {
  notify(message: ContactMessage): Promise<void>
}

export class LoggingContactNotifier implements ContactNotifier {
  async notify(message: ContactMessage): Promise<void> {
    logger.info(
      {
        messageId: message.id,
        from: message.email,
        subject: message.subject,
        spamScore: message.spamScore
      },
      'New contact message'
    )
  }
}
