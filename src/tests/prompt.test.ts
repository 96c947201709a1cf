import { describe, it, expect, beforeEach, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

import { logger } from '@/config/logger.js';
import { DEFAULT_IMAGE_STYLE, PromptService } from '@/services/prompt.js';

describe('PromptService', () => {
  let service: PromptService;

  beforeEach(() => {
    jest.clearAllMocks();
    service = new PromptService();
  });

  it('processes variables and conditionals', () => {
    const template = 'Hello {{name}} {{#extra}}Extra: {{extra}}{{/extra}}';

    expect(PromptService.processPrompt(template, { name: 'World', extra: '!' })).toBe('Hello World Extra: !');
    expect(PromptService.processPrompt(template, { name: 'World', extra: '' })).toBe('Hello World ');
    expect(PromptService.processPrompt(template, { name: 'World', extra: '   ' })).toBe('Hello World ');
  });

  it('replaces every occurrence and stringifies numbers', () => {
    expect(PromptService.processPrompt('{{n}} and {{n}}', { n: 10 })).toBe('10 and 10');
  });

  it('renders both parts of a template', async () => {
    const rendered = await service.render('narration', { page: 'Once upon a tide.' });

    expect(rendered.userPrompt).toBe('Once upon a tide.');
    expect(rendered.systemPrompt).toBe(
      'Read this picture-book page aloud for a young listener: warm, unhurried and expressive, with a short pause between sentences.',
    );
    expect(logger.debug).toHaveBeenCalledWith('Prompt template loaded successfully', expect.objectContaining({ promptName: 'narration' }));
  });

  it('caches loaded templates', async () => {
    const first = await service.loadPrompt('scene-rewrite');
    const second = await service.loadPrompt('scene-rewrite');

    expect(second).toBe(first);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it('throws when a prompt template is missing', async () => {
    await expect(service.loadPrompt('does-not-exist')).rejects.toThrow('Failed to load prompt template: does-not-exist');
    expect(logger.error).toHaveBeenCalled();
  });

  it('looks image styles up case-insensitively', async () => {
    expect(await service.getImageStyle('Pixel')).toEqual({
      description: 'A retro pixel art scene.',
      style: 'limited palette, crisp pixels, 16-bit game aesthetic',
    });
  });

  it('falls back to the default style for unknown names', async () => {
    expect(await service.getImageStyle('oil-on-velvet')).toEqual(DEFAULT_IMAGE_STYLE);
    expect(logger.warn).toHaveBeenCalledWith('Image style not found, using default', { styleName: 'oil-on-velvet' });
  });
});
