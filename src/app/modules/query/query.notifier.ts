import { logger } from "@/config/logger";
import { sendEmail, type Mailer } from "@/utils";
import type { IQuery, QueryNotifier, QueryResponseEvent } from "./query.interface";

export const formatResponseEmail = (query: IQuery) => ({
  subject: `Your query has been updated - Status: ${query.status}`,
  text: [
    `Hello ${query.requesterName},`,
    "",
    "Your query has been updated.",
    "",
    `Category: ${query.category ?? "General"}`,
    `Message: ${query.message}`,
    `Admin Response: ${query.adminResponse ?? ""}`,
    `Status: ${query.status}`,
    "",
    "Thank you,",
    "Admin Team",
  ].join("\n"),
});

/**
 * Mails guests when an admin response changes. Students have no mail sent;
 * they see the reply flagged as unseen in their own status view.
 */
export const createEmailNotifier = (mailer: Mailer = sendEmail): QueryNotifier => ({
  async responseChanged({ query }: QueryResponseEvent) {
    if (query.requesterIdentity !== null) return;
    const { subject, text } = formatResponseEmail(query);
    const sent = await mailer(query.requesterEmail, subject, text);
    if (sent) {
      logger.info(`[QUERY] Response email sent to ${query.requesterEmail} for query ${query.id}`);
    }
  },
});
