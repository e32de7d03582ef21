import dotenv from "dotenv";
import Joi, { ObjectSchema } from "joi";

import Debug from "./utils/debug.js";
import { maxChunkSize } from "./client/planner.js";

dotenv.config();

const debug = Debug("config");

export interface Config {
  url: string;
  chunkSize: number;
  retries: number;
  retryDelay: number;
  timeout: number;
}

export const urlSchema = Joi.string().uri({ scheme: ["http", "https"] });

const configSchema: ObjectSchema<Config> = Joi.object({
  url: urlSchema.default("http://127.0.0.1:8080/"),
  // 32 KiB stays well below the truncation threshold of the server
  chunkSize: Joi.number().integer().min(1).max(maxChunkSize).default(32768),
  retries: Joi.number().integer().min(0).default(0),
  retryDelay: Joi.number().integer().min(0).default(500),
  timeout: Joi.number().integer().min(1).default(10000),
});

export const getConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const config = Joi.attempt(
    {
      url: env["CHUNKFETCH_URL"],
      chunkSize: env["CHUNKFETCH_CHUNK_SIZE"],
      retries: env["CHUNKFETCH_RETRIES"],
      retryDelay: env["CHUNKFETCH_RETRY_DELAY"],
      timeout: env["CHUNKFETCH_TIMEOUT"],
    },
    configSchema
  );
  debug("loaded configuration %o", config);
  return config;
};
