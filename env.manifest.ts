// Canonical environment variable manifest for the picture story service.
// Every key of envSchema in src/config/environment.ts must be listed here.
export type EnvScope = 'dev' | 'prod' | 'runtime' | 'build' | 'test';
export interface EnvVarDescriptor {
  name: string;
  required: boolean;
  scopes: EnvScope[];
  secret?: boolean;
  default?: string;
  note?: string;
  source?: 'secret-manager' | 'substitution' | 'inline';
}

export const envManifest: EnvVarDescriptor[] = [
  { name: 'NODE_ENV', required: true, scopes: ['dev', 'runtime', 'prod'], default: 'development' },
  { name: 'PORT', required: false, scopes: ['dev', 'runtime'], default: '8080' },
  { name: 'LOG_LEVEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'info' },

  // Database
  { name: 'DB_HOST', required: true, scopes: ['dev', 'runtime', 'prod'], default: 'localhost', source: 'secret-manager' },
  { name: 'DB_PORT', required: false, scopes: ['dev', 'runtime', 'prod'], default: '5432', source: 'substitution' },
  { name: 'DB_USER', required: true, scopes: ['dev', 'runtime', 'prod'], default: 'postgres', secret: true, source: 'secret-manager' },
  { name: 'DB_PASSWORD', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true, source: 'secret-manager' },
  { name: 'DB_NAME', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'picture_stories', source: 'substitution' },
  { name: 'DB_SSL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'false', note: 'Enable for public Postgres endpoints.' },

  // Object storage
  { name: 'GOOGLE_CLOUD_PROJECT_ID', required: false, scopes: ['dev', 'runtime', 'prod'], source: 'substitution', note: 'Falls back to application default credentials.' },
  { name: 'STORAGE_BUCKET_NAME', required: true, scopes: ['dev', 'runtime', 'prod'], default: 'picture-stories', source: 'substitution' },
  { name: 'STORAGE_FOLDER', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'stories' },

  // AI providers
  { name: 'TEXT_PROVIDER', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'openai', note: 'openai or google-genai.' },
  { name: 'OPENAI_API_KEY', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true, source: 'secret-manager', note: 'Images, narration and embeddings always use OpenAI.' },
  { name: 'OPENAI_TEXT_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'gpt-4o' },
  { name: 'OPENAI_REPAIR_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'gpt-4o-mini', note: 'Scene rewrites and retrieval summaries.' },
  { name: 'OPENAI_IMAGE_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'dall-e-3' },
  { name: 'OPENAI_IMAGE_SIZE', required: false, scopes: ['dev', 'runtime', 'prod'], default: '1792x1024' },
  { name: 'OPENAI_IMAGE_QUALITY', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'standard' },
  { name: 'OPENAI_EMBEDDING_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'text-embedding-3-small' },
  { name: 'GOOGLE_GENAI_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true, source: 'secret-manager', note: 'Required when TEXT_PROVIDER=google-genai.' },
  { name: 'GOOGLE_GENAI_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'gemini-2.5-flash' },

  // Narration
  { name: 'TTS_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'gpt-4o-mini-tts' },
  { name: 'TTS_VOICE', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'fable' },
  { name: 'TTS_SPEED', required: false, scopes: ['dev', 'runtime', 'prod'], default: '1', note: 'Clamped to 0.25-4.' },

  // Pipeline
  { name: 'STORY_SCENE_COUNT', required: false, scopes: ['dev', 'runtime', 'prod'], default: '10' },
  { name: 'STAGE_TIMEOUT_TEXT_MS', required: false, scopes: ['dev', 'runtime', 'prod'], default: '120000' },
  { name: 'STAGE_TIMEOUT_IMAGES_MS', required: false, scopes: ['dev', 'runtime', 'prod'], default: '600000' },
  { name: 'STAGE_TIMEOUT_AUDIO_MS', required: false, scopes: ['dev', 'runtime', 'prod'], default: '300000' },
  { name: 'STAGE_TIMEOUT_INDEX_MS', required: false, scopes: ['dev', 'runtime', 'prod'], default: '60000' },

  // Retrieval
  { name: 'RETRIEVAL_ENABLED', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'false', note: 'Adds Wikipedia context to generation prompts.' },
  { name: 'RETRIEVAL_MAX_ARTICLES', required: false, scopes: ['dev', 'runtime', 'prod'], default: '3' },
  { name: 'EMBEDDING_DIMENSIONS', required: false, scopes: ['dev', 'runtime', 'prod'], default: '1536', note: 'Must match the retrieval_documents vector column.' },

  // Notification Engine
  { name: 'NOTIFICATION_ENGINE_URL', required: false, scopes: ['dev', 'runtime', 'prod'], note: 'Emails are skipped when unset.' },
  { name: 'NOTIFICATION_ENGINE_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true, source: 'secret-manager' },
  { name: 'STORY_BASE_URL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'http://localhost:3000/stories' },

  // HTTP surface
  { name: 'SERVICE_API_KEY', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true, source: 'secret-manager', note: 'Expected in the x-api-key header.' },
];

export function manifestByName(): Record<string, EnvVarDescriptor> {
  const map: Record<string, EnvVarDescriptor> = {};
  for (const v of envManifest) map[v.name] = v;
  return map;
}
