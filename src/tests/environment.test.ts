import { describe, it, expect, afterEach } from '@jest/globals';
import { envSchema, getEnvironment, pipelineConfig, resetEnvironmentForTests } from '@/config/environment.js';
import { envManifest, manifestByName } from '../../env.manifest.js';

describe('environment', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    resetEnvironmentForTests();
  });

  it('lists every configuration key in the manifest', () => {
    const manifestNames = envManifest.map((entry) => entry.name).sort();
    expect(manifestNames).toEqual(Object.keys(envSchema.shape).sort());
    expect(new Set(manifestNames).size).toBe(manifestNames.length);
  });

  it('marks credentials as secret', () => {
    const byName = manifestByName();
    for (const name of ['DB_PASSWORD', 'OPENAI_API_KEY', 'GOOGLE_GENAI_API_KEY', 'NOTIFICATION_ENGINE_API_KEY', 'SERVICE_API_KEY']) {
      expect(byName[name]?.secret).toBe(true);
    }
  });

  it('applies pipeline defaults', () => {
    const env = envSchema.parse({});

    expect(env.STORY_SCENE_COUNT).toBe(10);
    expect(env.RETRIEVAL_ENABLED).toBe(false);
    expect(env.TTS_SPEED).toBe(1);
    expect(env.NOTIFICATION_ENGINE_URL).toBeUndefined();
  });

  it('parses numbers, booleans and clamps the speech speed', () => {
    const env = envSchema.parse({
      STORY_SCENE_COUNT: '6',
      STAGE_TIMEOUT_TEXT_MS: 'not-a-number',
      RETRIEVAL_ENABLED: '1',
      TTS_SPEED: '9',
      NOTIFICATION_ENGINE_URL: '',
    });

    expect(env.STORY_SCENE_COUNT).toBe(6);
    expect(env.STAGE_TIMEOUT_TEXT_MS).toBe(120000);
    expect(env.RETRIEVAL_ENABLED).toBe(true);
    expect(env.TTS_SPEED).toBe(4);
    expect(env.NOTIFICATION_ENGINE_URL).toBeUndefined();
  });

  it('exposes stage timeouts through the pipeline config', () => {
    process.env.STAGE_TIMEOUT_IMAGES_MS = '45000';
    resetEnvironmentForTests();

    expect(getEnvironment().STAGE_TIMEOUT_IMAGES_MS).toBe(45000);
    expect(pipelineConfig.get().timeouts.renderingImagesMs).toBe(45000);
  });
});
