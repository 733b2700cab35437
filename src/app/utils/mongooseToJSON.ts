/**
 * Shared Mongoose toJSON / toObject helper
 *
 * Every model exposes its ObjectId as a string `id`, drops `_id` and `__v`,
 * and never serializes fields marked as secret (password hashes).
 *
 * Usage (example in a model file):
 *   import { applyMongooseToJSON } from '@/utils/mongooseToJSON';
 *   const schema = new mongoose.Schema(...);
 *   applyMongooseToJSON(schema, ['passwordHash']);
 */

import { Schema } from 'mongoose';

const buildTransform = (hidden: readonly string[]) =>
  (_doc: unknown, ret: Record<string, unknown>) => {
    if (ret._id !== undefined && ret._id !== null) {
      ret.id = String(ret._id);
    }
    delete ret._id;
    delete ret.__v;
    for (const field of hidden) {
      delete ret[field];
    }
    return ret;
  };

export function applyMongooseToJSON<T>(schema: Schema<T>, hidden: readonly string[] = []) {
  const options = {
    virtuals: false,
    versionKey: false,
    transform: buildTransform(hidden),
  };
  schema.set('toJSON', options);
  schema.set('toObject', options);
}

export default applyMongooseToJSON;
