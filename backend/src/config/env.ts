import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Load .env file
dotenv.config({ path: path.join(__dirname, '../../.env') });

const booleanString = z.string().transform(val => val === 'true');

// Define the environment schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('8000'),
  HOST: z.string().default('0.0.0.0'),

  // Gemini
  GOOGLE_API_KEY: z.string().default(''),
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  GEMINI_MAX_OUTPUT_TOKENS: z.string().transform(Number).default('8192'),
  ROOT_AGENT_TEMPERATURE: z.string().transform(Number).default('0.2'),
  DATABASE_AGENT_TEMPERATURE: z.string().transform(Number).default('0.01'),
  ANALYTICS_AGENT_TEMPERATURE: z.string().transform(Number).default('0.1'),
  BQML_AGENT_TEMPERATURE: z.string().transform(Number).default('0.1'),

  // BigQuery
  GOOGLE_CLOUD_PROJECT: z.string().default(''),
  BIGQUERY_DATASET_ID: z.string().default('analytics_dataset'),
  BIGQUERY_LOCATION: z.string().default('US'),
  BIGQUERY_MAX_ROWS: z.string().transform(Number).default('80'),

  // Conversation storage
  CONVERSATION_DB_PATH: z.string().default('data/conversations.db'),

  // Files
  UPLOAD_DIR: z.string().default('uploads'),
  CHART_DIR: z.string().default('uploads/charts'),
  MAX_UPLOAD_BYTES: z.string().transform(Number).default(String(50 * 1024 * 1024)),

  // Authentication
  GOOGLE_CLIENT_ID: z.string().default(''),
  GOOGLE_CLIENT_SECRET: z.string().default(''),
  GOOGLE_REDIRECT_URI: z.string().default('http://localhost:8000/api/auth/google/callback'),
  JWT_SECRET: z.string().min(8).default('change-me-in-production'),
  JWT_EXPIRATION_HOURS: z.string().transform(Number).default('24'),
  FRONTEND_URL: z.string().default('http://localhost:5174'),

  // API
  API_RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('60000'),
  API_RATE_LIMIT_MAX_REQUESTS: z.string().transform(Number).default('30'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('json'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5174'),
  CORS_CREDENTIALS: booleanString.default('true')
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:', error.flatten().fieldErrors);
      process.exit(1);
    }
    throw error;
  }
};

export const env = parseEnv();

export type Env = z.infer<typeof envSchema>;
