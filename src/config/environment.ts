import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production') {
  // In production, environment variables are set via deployment config
  if (fs.existsSync('.env.production')) {
    config({ path: '.env.production' });
  }
} else if (nodeEnv === 'development') {
  if (fs.existsSync('.env.local')) {
    config({ path: '.env.local' });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
} else if (nodeEnv !== 'test') {
  if (fs.existsSync(`.env.${nodeEnv}`)) {
    config({ path: `.env.${nodeEnv}` });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
}

const numberFromString = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => {
      const n = v ? parseInt(v, 10) : fallback;
      return Number.isNaN(n) ? fallback : n;
    });

const booleanFromString = (fallback: 'true' | 'false') =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: numberFromString(8080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),

  // Database
  DB_HOST: z.string().optional().default('localhost'),
  DB_PORT: numberFromString(5432),
  DB_USER: z.string().optional().default('postgres'),
  DB_PASSWORD: z.string().optional().default(''),
  DB_NAME: z.string().optional().default('picture_stories'),
  DB_SSL: booleanFromString('false'),

  // Object storage
  GOOGLE_CLOUD_PROJECT_ID: z.string().optional(),
  STORAGE_BUCKET_NAME: z.string().optional().default('picture-stories'),
  STORAGE_FOLDER: z.string().optional().default('stories'),

  // AI providers
  TEXT_PROVIDER: z.enum(['openai', 'google-genai']).optional().default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_TEXT_MODEL: z.string().optional().default('gpt-4o'),
  OPENAI_REPAIR_MODEL: z.string().optional().default('gpt-4o-mini'),
  OPENAI_IMAGE_MODEL: z.string().optional().default('dall-e-3'),
  OPENAI_IMAGE_SIZE: z.enum(['1024x1024', '1792x1024', '1024x1792']).optional().default('1792x1024'),
  OPENAI_IMAGE_QUALITY: z.enum(['standard', 'hd']).optional().default('standard'),
  OPENAI_EMBEDDING_MODEL: z.string().optional().default('text-embedding-3-small'),
  GOOGLE_GENAI_API_KEY: z.string().optional(),
  GOOGLE_GENAI_MODEL: z.string().optional().default('gemini-2.5-flash'),

  // Narration
  TTS_MODEL: z.string().optional().default('gpt-4o-mini-tts'),
  TTS_VOICE: z.string().optional().default('fable'),
  TTS_SPEED: z
    .string()
    .optional()
    .default('1')
    .transform((v) => {
      const n = parseFloat(v);
      return Number.isNaN(n) ? 1 : Math.max(0.25, Math.min(4, n));
    }),

  // Pipeline
  STORY_SCENE_COUNT: numberFromString(10),
  STAGE_TIMEOUT_TEXT_MS: numberFromString(120000),
  STAGE_TIMEOUT_IMAGES_MS: numberFromString(600000),
  STAGE_TIMEOUT_AUDIO_MS: numberFromString(300000),
  STAGE_TIMEOUT_INDEX_MS: numberFromString(60000),

  // Retrieval
  RETRIEVAL_ENABLED: booleanFromString('false'),
  RETRIEVAL_MAX_ARTICLES: numberFromString(3),
  EMBEDDING_DIMENSIONS: numberFromString(1536),

  // Notification Engine
  NOTIFICATION_ENGINE_URL: z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional()),
  NOTIFICATION_ENGINE_API_KEY: z.string().optional(),

  // Link used in story-ready emails; the story key is appended
  STORY_BASE_URL: z.string().url().optional().default('http://localhost:3000/stories'),

  // Service-to-service authentication for the HTTP surface
  SERVICE_API_KEY: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

let cachedEnv: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse(process.env);
    return cachedEnv;
  } catch (error) {
    console.error('Environment validation failed:', error);
    throw error;
  }
}

// Test-only helper so suites can change process.env between cases
export function resetEnvironmentForTests(): void {
  cachedEnv = null;
}

export const databaseConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      ssl: env.DB_SSL,
    };
  },
};

export const storageConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      projectId: env.GOOGLE_CLOUD_PROJECT_ID,
      bucketName: env.STORAGE_BUCKET_NAME,
      folder: env.STORAGE_FOLDER,
    };
  },
};

export const pipelineConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      sceneCount: env.STORY_SCENE_COUNT,
      timeouts: {
        generatingMs: env.STAGE_TIMEOUT_TEXT_MS,
        renderingImagesMs: env.STAGE_TIMEOUT_IMAGES_MS,
        synthesizingAudioMs: env.STAGE_TIMEOUT_AUDIO_MS,
        indexingMs: env.STAGE_TIMEOUT_INDEX_MS,
      },
      retrievalEnabled: env.RETRIEVAL_ENABLED,
    };
  },
};
