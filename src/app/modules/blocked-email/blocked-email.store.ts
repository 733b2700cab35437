import status from "http-status";
import { guardStore, isDuplicateKeyError } from "@/errors";
import { getApiErrorClass } from "@/interface";
import { BlockedEmailStore, IBlockedEmail } from "./blocked-email.interface";
import { BlockedEmail, LeanBlockedEmail, toBlockedEmail } from "./blocked-email.model";

const CONTEXT = "BLOCKED_EMAIL_STORE";
const ApiError = getApiErrorClass(CONTEXT);

export const mongoBlockedEmailStore: BlockedEmailStore = {
  async isBlocked(email: string): Promise<boolean> {
    return guardStore(CONTEXT, async () => {
      const found = await BlockedEmail.exists({ email: email.trim().toLowerCase(), isActive: true });
      return found !== null;
    });
  },

  async list(): Promise<IBlockedEmail[]> {
    return guardStore(CONTEXT, async () => {
      const docs = await BlockedEmail.find().sort({ createdAt: -1, _id: -1 }).lean<LeanBlockedEmail[]>();
      return docs.map(toBlockedEmail);
    });
  },

  async toggle(email: string): Promise<IBlockedEmail> {
    const key = email.trim().toLowerCase();
    const flip = () =>
      BlockedEmail.findOneAndUpdate(
        { email: key },
        [
          {
            $set: {
              email: key,
              isActive: { $not: [{ $ifNull: ["$isActive", false] }] },
              createdAt: { $ifNull: ["$createdAt", "$$NOW"] },
              updatedAt: "$$NOW",
            },
          },
        ],
        // timestamps are written by the pipeline itself
        { upsert: true, new: true, timestamps: false }
      ).lean<LeanBlockedEmail>();

    return guardStore(CONTEXT, async () => {
      let doc: LeanBlockedEmail | null;
      try {
        doc = await flip();
      } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;
        doc = await flip();
      }
      if (!doc) throw new ApiError(status.INTERNAL_SERVER_ERROR, `Block list toggle returned nothing for ${key}`);
      return toBlockedEmail(doc);
    });
  },
};
