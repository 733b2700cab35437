import mongoose from "mongoose";
import config from "./index";
import { logger } from "./logger";

mongoose.set("strictQuery", true);
// fail queued operations instead of waiting forever on a dead connection
mongoose.set("bufferTimeoutMS", 5000);

let connecting: Promise<typeof mongoose> | null = null;

export const connectDB = async () => {
  if (mongoose.connection.readyState === 1) return mongoose;
  if (!connecting) {
    connecting = mongoose
      .connect(config.DATABASE_URL, {
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 20000,
      })
      .then((conn) => {
        logger.info(`[DB] Connected to ${conn.connection.host}/${conn.connection.name}`);
        return conn;
      })
      .catch((err) => {
        connecting = null;
        throw err;
      });
  }
  return connecting;
};

mongoose.connection.on("disconnected", () => logger.warn("[DB] Mongoose disconnected."));
mongoose.connection.on("error", (err: Error) => logger.error(`[DB] Connection error: ${err.message}`));
