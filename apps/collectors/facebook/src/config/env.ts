import * as dotenv from "dotenv";
import * as Joi from "joi";

dotenv.config();
type INodeEnv = "development" | "production" | "staging" | "test";
type ILogLevel = "error" | "warn" | "info" | "debug";

interface EnvVars {
  NODE_ENV: INodeEnv;
  FACEBOOK_ACCESS_TOKEN?: string;
  FACEBOOK_GRAPH_API_VERSION: string;
  FACEBOOK_MIN_REQUEST_INTERVAL_MS: number;
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  UUID_TABLE_NAME: string;
  UUID_PREFIX: string;
  LOG_LEVEL: ILogLevel;
}

// Define validation schema for environment variables
const envSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string()
      .valid("development", "production", "staging", "test")
      .default("development"),

    // Only the export script needs it; FacebookClient is handed its token
    FACEBOOK_ACCESS_TOKEN: Joi.string(),
    FACEBOOK_GRAPH_API_VERSION: Joi.string()
      .pattern(/^v\d+\.\d+$/)
      .default("v8.0"),
    FACEBOOK_MIN_REQUEST_INTERVAL_MS: Joi.number().integer().min(0).default(0),

    MONGO_URI: Joi.string().default("mongodb://localhost:27017"),
    MONGO_DB_NAME: Joi.string().default("socialMediaTools"),

    UUID_TABLE_NAME: Joi.string().default("facebook-users"),
    UUID_PREFIX: Joi.string().default("avf-facebook-uuid-"),

    LOG_LEVEL: Joi.string()
      .valid("error", "warn", "info", "debug")
      .default("debug"),
  })
  .unknown();

// Validate environment variables against the schema
const validation = envSchema
  .prefs({ errors: { label: "key" } })
  .validate(process.env);

// Throw an error if validation fails
if (validation.error) {
  throw new Error(`Config validation error: ${validation.error.message}`);
}

const validatedEnvVars: EnvVars = validation.value;

export const config = Object.freeze({
  appEnvironment: validatedEnvVars.NODE_ENV,

  logLevel: validatedEnvVars.LOG_LEVEL,

  facebook: {
    accessToken: validatedEnvVars.FACEBOOK_ACCESS_TOKEN,
    graphApiVersion: validatedEnvVars.FACEBOOK_GRAPH_API_VERSION,
    minRequestIntervalMs: validatedEnvVars.FACEBOOK_MIN_REQUEST_INTERVAL_MS,
  },

  db: {
    uri: validatedEnvVars.MONGO_URI,
    name: validatedEnvVars.MONGO_DB_NAME,
  },

  uuidTable: {
    name: validatedEnvVars.UUID_TABLE_NAME,
    prefix: validatedEnvVars.UUID_PREFIX,
  },
});
