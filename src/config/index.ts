import dotenv from 'dotenv';
import Joi from 'joi';

// Load .env before anything reads process.env
dotenv.config();

export interface Config {
  app: {
    port: number;
    env: string;
  };
  greenApi: {
    apiUrl: string;
    instanceId: string;
    token: string;
    receiveTimeout: number; // seconds, long polling window of receiveNotification
  };
  openai: {
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  bot: {
    adminPhones: string[];
    leadsFile: string;
    processedCacheSize: number;
  };
  polling: {
    idleDelayMs: number;
    errorDelayMs: number;
  };
  logging: {
    level: string;
    format: string;
  };
}

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

const config: Config = {
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
  },
  greenApi: {
    apiUrl: process.env.GREEN_API_URL || 'https://api.green-api.com',
    instanceId: process.env.INSTANCE_ID || '',
    token: process.env.INSTANCE_TOKEN || '',
    receiveTimeout: parseInt(process.env.GREEN_API_RECEIVE_TIMEOUT || '5', 10),
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '30000', 10),
  },
  bot: {
    adminPhones: parseList(process.env.ADMIN_PHONES),
    leadsFile: process.env.LEADS_FILE || 'client_records.json',
    processedCacheSize: parseInt(process.env.PROCESSED_CACHE_SIZE || '10000', 10),
  },
  polling: {
    idleDelayMs: parseInt(process.env.POLL_IDLE_DELAY_MS || '1000', 10),
    errorDelayMs: parseInt(process.env.POLL_ERROR_DELAY_MS || '5000', 10),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    format: process.env.LOG_FORMAT || 'json',
  },
};

const configSchema = Joi.object({
  app: Joi.object({
    port: Joi.number().integer().min(0).max(65535).required(),
    env: Joi.string().required(),
  }).required(),
  greenApi: Joi.object({
    apiUrl: Joi.string().uri().required(),
    instanceId: Joi.string().required().messages({ 'string.empty': 'INSTANCE_ID is required' }),
    token: Joi.string().required().messages({ 'string.empty': 'INSTANCE_TOKEN is required' }),
    receiveTimeout: Joi.number().integer().min(5).max(60).required(),
  }).required(),
  openai: Joi.object({
    apiKey: Joi.string().required().messages({ 'string.empty': 'OPENAI_API_KEY is required' }),
    model: Joi.string().required(),
    timeoutMs: Joi.number().integer().positive().required(),
  }).required(),
  bot: Joi.object({
    adminPhones: Joi.array().items(Joi.string()).required(),
    leadsFile: Joi.string().required(),
    processedCacheSize: Joi.number().integer().positive().required(),
  }).required(),
  polling: Joi.object({
    idleDelayMs: Joi.number().integer().min(0).required(),
    errorDelayMs: Joi.number().integer().min(0).required(),
  }).required(),
  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').required(),
    format: Joi.string().valid('json', 'simple').required(),
  }).required(),
});

/**
 * Validates the loaded configuration, returning every problem found
 */
export function validateConfig(candidate: Config = config): string[] {
  const { error } = configSchema.validate(candidate, { abortEarly: false });
  return error ? error.details.map(detail => detail.message) : [];
}

export default config;
