import config from "@/config";
import { logger } from "@/config/logger";
import { Resend } from "resend";

const resend = config.RESEND_API_KEY ? new Resend(config.RESEND_API_KEY) : null;

export type Mailer = (to: string, subject: string, text: string) => Promise<boolean>;

/**
 * Sends a plain-text mail through Resend. Returns false when mail is not
 * configured or the provider rejected the message.
 */
export const sendEmail: Mailer = async (to, subject, text) => {
  if (!resend || !config.RESEND_DOMAIN) {
    logger.warn(`[EMAIL] Mail is not configured, skipping "${subject}" to ${to}`);
    return false;
  }
  const { error } = await resend.emails.send({
    from: `${config.MAIL_FROM_NAME} <mail@${config.RESEND_DOMAIN}>`,
    to,
    subject,
    text,
  });
  if (error) {
    logger.error(`[EMAIL] Failed to send email to ${to}. Error: ${error.message}`)
    return false;
  }
  logger.info(`[EMAIL] Sent "${subject}" to ${to}`);
  return true;
}
