import { describe, it, expect } from '@jest/globals';
import { ImageRenderer } from '@/services/image-renderer.js';
import { PromptService } from '@/services/prompt.js';
import { MaxRetriesExceededError } from '@/shared/errors.js';
import {
  FakeImageService,
  FakeObjectStorage,
  ScriptedTextService,
  fakeDownloader,
  noSleep,
} from './helpers/fakes.js';

const NOW = 1700000000000;

function createRenderer(imageService: FakeImageService, rewriteService: ScriptedTextService) {
  const storage = new FakeObjectStorage();
  const sleeps: number[] = [];
  const renderer = new ImageRenderer({
    imageService,
    rewriteService,
    storage,
    prompts: new PromptService(),
    downloader: fakeDownloader,
    sleep: async (ms) => {
      sleeps.push(ms);
      await noSleep();
    },
    now: () => NOW,
  });
  return { renderer, storage, sleeps };
}

describe('ImageRenderer', () => {
  it('stores one public image per scene in scene order', async () => {
    const { renderer, storage } = createRenderer(new FakeImageService(), new ScriptedTextService([]));

    const urls = await renderer.render(['a calm harbour', 'a stormy sea', 'a lighthouse'], 'storybook', undefined, {
      storyId: 'story-1',
    });

    expect(urls).toEqual([
      `https://storage.test/story-1/images/scene-01-${NOW}.png`,
      `https://storage.test/story-1/images/scene-02-${NOW}.png`,
      `https://storage.test/story-1/images/scene-03-${NOW}.png`,
    ]);
    expect(storage.uploads.get(`story-1/images/scene-02-${NOW}.png`)?.contentType).toBe('image/png');
  });

  it('builds the image prompt from the style template', async () => {
    const imageService = new FakeImageService();
    const { renderer } = createRenderer(imageService, new ScriptedTextService([]));

    await renderer.render(['Draw a fox in the snow'], 'comic', 'low vision', { storyId: 'story-1' });

    expect(imageService.prompts).toEqual([
      'A bold comic book panel. a fox in the snow\n\n' +
        'Do not include any text, letters, captions, dialogue or speech bubbles in the image. ' +
        'Keep the composition clear and uncluttered for a reader with these needs: low vision.\n\n' +
        'Style: clean ink outlines, flat vibrant colours, dynamic composition, halftone shading',
    ]);
  });

  it('retries a rejected scene with rewritten descriptions and keeps the scene count', async () => {
    const imageService = new FakeImageService((prompt) =>
      prompt.includes('dragon') ? new Error('Your request was rejected by the safety system') : null,
    );
    const rewriteService = new ScriptedTextService(['a friendly dragon waves hello', 'a friendly cloud waves hello']);
    const { renderer, sleeps } = createRenderer(imageService, rewriteService);

    const urls = await renderer.render(
      ['a calm harbour at dawn', 'a dragon breathes fire on the village', 'a lighthouse at night'],
      'storybook',
      undefined,
      { storyId: 'story-1' },
    );

    expect(urls).toHaveLength(3);
    expect(urls[1]).toBe(`https://storage.test/story-1/images/scene-02-${NOW}.png`);
    expect(rewriteService.calls).toHaveLength(2);
    expect(rewriteService.calls[0]?.prompt).toContain('a dragon breathes fire on the village');
    expect(rewriteService.calls[0]?.prompt).toContain('Rejection reason: Your request was rejected by the safety system');
    expect(rewriteService.calls[1]?.prompt).toContain('a friendly dragon waves hello');
    expect(imageService.prompts.filter((prompt) => prompt.includes('a friendly cloud waves hello'))).toHaveLength(1);
    expect(sleeps).toHaveLength(2);
    for (const ms of sleeps) {
      expect(ms).toBeGreaterThanOrEqual(1000);
      expect(ms).toBeLessThanOrEqual(3000);
    }
  });

  it('fails the batch when a scene exhausts its attempts', async () => {
    const imageService = new FakeImageService(() => new Error('content_policy_violation'));
    const rewriteService = new ScriptedTextService([], 'a gentler scene');
    const { renderer } = createRenderer(imageService, rewriteService);

    const failure = await renderer
      .render(['a scary monster'], 'storybook', undefined, { storyId: 'story-1' })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(MaxRetriesExceededError);
    if (failure instanceof MaxRetriesExceededError) {
      expect(failure.sceneIndex).toBe(0);
      expect(failure.attempts).toBe(3);
      expect(failure.category).toBe('upstream');
    }
    expect(imageService.prompts).toHaveLength(3);
    expect(rewriteService.calls).toHaveLength(2);
  });

  it('falls back to a local sanitizer when the rewrite call fails', async () => {
    const rewriteService = new ScriptedTextService([new Error('rewrite model unavailable')]);
    const { renderer } = createRenderer(new FakeImageService(), rewriteService);

    const rewritten = await renderer.rewriteScene('a knight with a sword', new Error('blocked'));

    expect(rewritten).toBe('a knight with a object The scene is wholesome, safe, and cheerful. Warm, gentle lighting.');
  });
});
