import { describe, it, expect } from '@jest/globals';
import { StructuredContentGenerator, validateStoryContent } from '@/services/content-generator.js';
import { PromptService } from '@/services/prompt.js';
import { ContentValidationError } from '@/shared/errors.js';
import { ScriptedTextService, storyContentJson } from './helpers/fakes.js';

const PROMPT = 'A little boat that is afraid of waves';

function createGenerator(textService: ScriptedTextService, sceneCount = 3) {
  return new StructuredContentGenerator({ textService, prompts: new PromptService(), sceneCount });
}

describe('validateStoryContent', () => {
  it('matches keys case-insensitively', () => {
    const raw = JSON.stringify({
      Prompt: PROMPT,
      TITLE: 'Waves',
      Scenes: ['a', 'b'],
      SUMMARIES: ['one', 'two'],
    });

    const result = validateStoryContent(raw, PROMPT, 2);

    expect(result).toEqual({
      ok: true,
      value: {
        content: { prompt: PROMPT, title: 'Waves', scenes: ['a', 'b'], summaries: ['one', 'two'] },
        promptRepaired: false,
      },
    });
  });

  it('overwrites a prompt field that drifted from the input', () => {
    const result = validateStoryContent(storyContentJson('a paraphrased prompt', 2), PROMPT, 2);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.content.prompt).toBe(PROMPT);
      expect(result.value.promptRepaired).toBe(true);
    }
  });

  it('accepts output wrapped in a markdown code block', () => {
    const raw = '```json\n' + storyContentJson(PROMPT, 2) + '\n```';
    expect(validateStoryContent(raw, PROMPT, 2).ok).toBe(true);
  });

  it('reports every cardinality problem', () => {
    const result = validateStoryContent(storyContentJson(PROMPT, 2), PROMPT, 3);

    expect(result).toEqual({
      ok: false,
      error: 'scenes: scenes must contain exactly 3 entries; summaries: summaries must contain exactly 3 entries',
    });
  });

  it('rejects a title longer than the stored column', () => {
    const raw = storyContentJson(PROMPT, 1, 'W'.repeat(256));
    expect(validateStoryContent(raw, PROMPT, 1)).toEqual({
      ok: false,
      error: 'title: title must be at most 255 characters',
    });
    expect(validateStoryContent(storyContentJson(PROMPT, 1, 'W'.repeat(255)), PROMPT, 1).ok).toBe(true);
  });

  it('rejects an empty title', () => {
    const raw = JSON.stringify({ prompt: PROMPT, title: '   ', scenes: ['a'], summaries: ['b'] });
    expect(validateStoryContent(raw, PROMPT, 1)).toEqual({ ok: false, error: 'title: title must not be empty' });
  });

  it('rejects a JSON array', () => {
    expect(validateStoryContent('[1, 2]', PROMPT, 1)).toEqual({ ok: false, error: 'response must be a JSON object' });
  });
});

describe('StructuredContentGenerator', () => {
  it('returns content validated on the first attempt', async () => {
    const textService = new ScriptedTextService([storyContentJson(PROMPT, 3)]);

    const content = await createGenerator(textService).generate(PROMPT);

    expect(content.title).toBe('The Brave Little Boat');
    expect(content.scenes).toHaveLength(3);
    expect(content.summaries).toHaveLength(3);
    expect(textService.calls).toHaveLength(1);
    expect(textService.calls[0]?.prompt).toContain(`exactly 3 scenes based on the following prompt: ${PROMPT}`);
    expect(textService.calls[0]?.options?.schemaName).toBe('story_content');
    expect(textService.calls[0]?.options?.temperature).toBe(0.8);
  });

  it('self-heals by feeding the validation error back to the model', async () => {
    const textService = new ScriptedTextService(['Sorry, I cannot answer in JSON.', storyContentJson(PROMPT, 3)]);

    const content = await createGenerator(textService).generate(PROMPT);

    expect(content.scenes).toHaveLength(3);
    expect(textService.calls).toHaveLength(2);
    const repairCall = textService.calls[1];
    expect(repairCall?.prompt).toContain('Validation error: response is not valid JSON');
    expect(repairCall?.prompt).toContain('Previous answer:\nSorry, I cannot answer in JSON.');
    expect(repairCall?.options?.temperature).toBe(0.4);
  });

  it('gives up after three attempts', async () => {
    const wrongCount = storyContentJson(PROMPT, 2);
    const textService = new ScriptedTextService([wrongCount, wrongCount, wrongCount, storyContentJson(PROMPT, 3)]);

    const failure = await createGenerator(textService)
      .generate(PROMPT)
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ContentValidationError);
    if (failure instanceof ContentValidationError) {
      expect(failure.attempts).toBe(3);
      expect(failure.category).toBe('validation');
      expect(failure.lastValidationError).toContain('scenes must contain exactly 3 entries');
    }
    expect(textService.calls).toHaveLength(3);
  });

  it('folds the accessibility hint and retrieval context into the instruction', async () => {
    const textService = new ScriptedTextService([storyContentJson(PROMPT, 3)]);

    await createGenerator(textService).generate(PROMPT, 'dyslexia', { context: 'Boats float because of buoyancy.' });

    const prompt = textService.calls[0]?.prompt ?? '';
    expect(prompt).toContain('The reader has the following accessibility needs: dyslexia.');
    expect(prompt).toContain('Background material that may help keep facts accurate');
    expect(prompt).toContain('Boats float because of buoyancy.');
  });

  it('omits the optional sections when there is nothing to add', async () => {
    const textService = new ScriptedTextService([storyContentJson(PROMPT, 3)]);

    await createGenerator(textService).generate(PROMPT);

    const prompt = textService.calls[0]?.prompt ?? '';
    expect(prompt).not.toContain('accessibility needs');
    expect(prompt).not.toContain('Background material');
  });
});
