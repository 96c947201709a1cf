/**
 * Composition root. Builds every capability once per process and wires it
 * into the services; nothing else constructs clients.
 */

import { AIGateway } from '@/ai/gateway.js';
import { getEnvironment, pipelineConfig, storageConfig } from '@/config/environment.js';
import { DatabasePersistenceGateway } from '@/adapters/database/persistence-gateway.js';
import { checkDatabaseConnection, getDatabase } from '@/db/connection.js';
import { StructuredContentGenerator } from '@/services/content-generator.js';
import { EmailTemplateService } from '@/services/email-templates.js';
import { ImageRenderer } from '@/services/image-renderer.js';
import { NarrationSynthesizer } from '@/services/narration.js';
import { NotificationClient } from '@/services/notification-client.js';
import { PromptService } from '@/services/prompt.js';
import { WikipediaReferenceSearch } from '@/services/reference-search.js';
import {
  ContextualRetrievalAugmenter,
  PersonalStoryIndex,
  RecommendationService,
} from '@/services/retrieval.js';
import { StorageService } from '@/services/storage.js';
import { StoryLibrary } from '@/services/story-library.js';
import { StoryOrchestrator } from '@/services/story-orchestrator.js';
import { UserService } from '@/services/user-service.js';
import { PgVectorRetrievalIndex } from '@/services/vector-index.js';
import { HealthService } from '@/shared/health.js';
import { PersistenceGateway } from '@/shared/interfaces.js';

export interface AppDependencies {
  persistence: PersistenceGateway;
  orchestrator: StoryOrchestrator;
  library: StoryLibrary;
  users: UserService;
  recommendations: RecommendationService;
  health: HealthService;
  serviceApiKey: string | undefined;
  environment: string;
}

export function createDependencies(): AppDependencies {
  const env = getEnvironment();
  const pipeline = pipelineConfig.get();
  const db = getDatabase();

  const persistence = new DatabasePersistenceGateway(db);
  const ai = AIGateway.fromEnvironment();
  const prompts = new PromptService();
  const storage = new StorageService(storageConfig.get());

  const index = new PgVectorRetrievalIndex({
    db,
    embeddings: ai.getEmbeddingService(),
    summarizer: ai.getRepairTextService(),
    prompts,
  });

  const orchestrator = new StoryOrchestrator({
    persistence,
    generator: new StructuredContentGenerator({
      textService: ai.getTextService(),
      prompts,
      sceneCount: pipeline.sceneCount,
    }),
    renderer: new ImageRenderer({
      imageService: ai.getImageService(),
      rewriteService: ai.getRepairTextService(),
      storage,
      prompts,
    }),
    narrator: new NarrationSynthesizer({ ttsService: ai.getTTSService(), storage, prompts }),
    notifier: new NotificationClient({
      baseUrl: env.NOTIFICATION_ENGINE_URL,
      apiKey: env.NOTIFICATION_ENGINE_API_KEY,
    }),
    emails: new EmailTemplateService(),
    sceneCount: pipeline.sceneCount,
    timeouts: pipeline.timeouts,
    ...(pipeline.retrievalEnabled && {
      augmenter: new ContextualRetrievalAugmenter({
        referenceSearch: new WikipediaReferenceSearch(),
        index,
        maxArticles: env.RETRIEVAL_MAX_ARTICLES,
      }),
    }),
    personalIndex: new PersonalStoryIndex(index),
    storyUrl: (storyId) => `${env.STORY_BASE_URL.replace(/\/$/, '')}/${storyId}`,
  });

  return {
    persistence,
    orchestrator,
    library: new StoryLibrary(persistence),
    users: new UserService(persistence),
    recommendations: new RecommendationService({
      index,
      stories: persistence.stories,
      textService: ai.getTextService(),
      prompts,
    }),
    health: new HealthService(() => checkDatabaseConnection(db)),
    serviceApiKey: env.SERVICE_API_KEY,
    environment: env.NODE_ENV,
  };
}
