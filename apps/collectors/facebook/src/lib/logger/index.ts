import { config } from "@/config";
import {
  AppLogger,
  buildDevLogger,
  buildTestLogger,
  prodDevLogger,
} from "./loggings";

const baseLogger =
  config.appEnvironment === "production"
    ? prodDevLogger(config.logLevel)
    : config.appEnvironment === "test"
      ? buildTestLogger()
      : buildDevLogger(config.logLevel);

export const logger = new AppLogger(baseLogger, "facebook-collector");
