import { logger } from "@/config/logger";
import { parseWith } from "@/utils/parseWith";
import type { BlockedEmailStore, IBlockedEmail } from "./blocked-email.interface";
import { toggleBlockedEmailValidation } from "./blocked-email.validation";

const CONTEXT = "BLOCKED_EMAIL";

export const createBlockedEmailService = ({ blockedEmails }: { blockedEmails: BlockedEmailStore }) => ({
  list: () => blockedEmails.list(),

  async toggle(body: unknown): Promise<IBlockedEmail> {
    const { email } = parseWith(toggleBlockedEmailValidation, body, CONTEXT);
    const entry = await blockedEmails.toggle(email);
    logger.info(`[${CONTEXT}] ${entry.email} ${entry.isActive ? "blocked" : "unblocked"}`);
    return entry;
  },
});

export type BlockedEmailService = ReturnType<typeof createBlockedEmailService>;
