import mongoose from "mongoose";
import { logger } from "@/lib/logger";
import { config } from "./env";

export const connectDB = async (): Promise<void> => {
  try {
    await mongoose.connect(config.db.uri, {
      dbName: config.db.name,
    });

    logger.info("MongoDB connected", { dbName: config.db.name });
  } catch (error) {
    logger.error("MongoDB connection failed", {
      error: error instanceof Error ? error : String(error),
    });
    await logger.flushAndExit(1);
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info("MongoDB disconnected");
};
