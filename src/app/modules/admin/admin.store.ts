import { isValidObjectId } from "mongoose";
import { guardStore } from "@/errors";
import { AdminStore, AdminWithSecret, IAdmin, NewAdmin } from "./admin.interface";
import { Admin, LeanAdmin, toAdmin, toAdminWithSecret } from "./admin.model";

const CONTEXT = "ADMIN_STORE";

export const mongoAdminStore: AdminStore = {
  async create(input: NewAdmin): Promise<IAdmin> {
    return guardStore(CONTEXT, async () => {
      const doc = await Admin.create(input);
      return toAdmin(doc.toObject<LeanAdmin>({ transform: false }));
    });
  },

  async findById(id: string): Promise<IAdmin | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Admin.findById(id).lean<LeanAdmin>();
      return doc ? toAdmin(doc) : null;
    });
  },

  async findByUsername(username: string): Promise<IAdmin | null> {
    return guardStore(CONTEXT, async () => {
      const doc = await Admin.findOne({ username: username.trim() }).lean<LeanAdmin>();
      return doc ? toAdmin(doc) : null;
    });
  },

  async findForLogin(identifier: string): Promise<AdminWithSecret | null> {
    const value = identifier.trim();
    return guardStore(CONTEXT, async () => {
      const doc = await Admin.findOne({
        $or: [{ username: value }, { email: value.toLowerCase() }],
      }).lean<LeanAdmin>();
      return doc ? toAdminWithSecret(doc) : null;
    });
  },

  async existsByUsernameOrEmail(username: string, email: string): Promise<boolean> {
    return guardStore(CONTEXT, async () => {
      const found = await Admin.exists({ $or: [{ username }, { email: email.toLowerCase() }] });
      return found !== null;
    });
  },

  async updatePasswordHash(id: string, passwordHash: string): Promise<boolean> {
    if (!isValidObjectId(id)) return false;
    return guardStore(CONTEXT, async () => {
      const { matchedCount } = await Admin.updateOne({ _id: id }, { $set: { passwordHash } });
      return matchedCount > 0;
    });
  },
};
