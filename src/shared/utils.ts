// -----------------------------------------------------------------------------
// Shared Utilities - Environment-agnostic utility functions
// -----------------------------------------------------------------------------

import { StageTimeoutError } from './errors.js';

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Uniform random integer in [min, max]
 */
export function randomIntBetween(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

export function preview(text: string, length = 200): string {
  return text.length > length ? `${text.substring(0, length)}...` : text;
}

// -----------------------------------------------------------------------------
// Key-set helpers. Stored as arrays, treated as sets.
// -----------------------------------------------------------------------------

export function addUnique(values: readonly string[], value: string): string[] {
  return values.includes(value) ? [...values] : [...values, value];
}

export function removeValue(values: readonly string[], value: string): string[] {
  return values.filter((v) => v !== value);
}

export function dedupe(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Race a promise against a stage deadline. The underlying call is not
 * cancelled; its eventual settlement is ignored.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  stage: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(stage, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Parses AI response, handling various formats including markdown code blocks
 */
export function parseAIResponse(response: string): unknown {
  let cleanedResponse = response.trim();

  // Handle markdown code blocks
  if (response.includes('```json')) {
    const jsonMatch = response.match(/```json\s*([\s\S]*?)\s*```/);
    if (jsonMatch && jsonMatch[1]) {
      cleanedResponse = jsonMatch[1].trim();
    }
  } else if (response.includes('```')) {
    const withoutFences = response.replace(/```[a-zA-Z]*/g, '').trim();
    const startIndex = withoutFences.indexOf('{');
    const lastIndex = withoutFences.lastIndexOf('}');
    if (startIndex !== -1 && lastIndex !== -1 && lastIndex > startIndex) {
      cleanedResponse = withoutFences.substring(startIndex, lastIndex + 1);
    }
  }

  // Extract JSON if response contains other text
  if (!cleanedResponse.startsWith('{') && !cleanedResponse.startsWith('[')) {
    const startIndex = cleanedResponse.indexOf('{');
    const lastIndex = cleanedResponse.lastIndexOf('}');
    if (startIndex !== -1 && lastIndex !== -1 && lastIndex > startIndex) {
      cleanedResponse = cleanedResponse.substring(startIndex, lastIndex + 1);
    }
  }

  const extractFirstJsonBlock = (input: string): string | null => {
    let startIndex = -1;
    const stack: string[] = [];
    let inString = false;
    let escaping = false;

    for (let i = 0; i < input.length; i++) {
      const char = input[i];

      if (inString) {
        if (escaping) {
          escaping = false;
          continue;
        }
        if (char === '\\') {
          escaping = true;
          continue;
        }
        if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === '"') {
        inString = true;
        continue;
      }

      if (char === '{' || char === '[') {
        if (stack.length === 0) {
          startIndex = i;
        }
        stack.push(char === '{' ? '}' : ']');
        continue;
      }

      if ((char === '}' || char === ']') && stack.length > 0) {
        const expected = stack.pop();
        if (char !== expected) {
          // Mismatched braces, reset and continue searching
          stack.length = 0;
          startIndex = -1;
          continue;
        }
        if (stack.length === 0 && startIndex !== -1) {
          return input.slice(startIndex, i + 1);
        }
      }
    }

    return null;
  };

  try {
    return JSON.parse(cleanedResponse);
  } catch (primaryError) {
    const fallbackJson = extractFirstJsonBlock(cleanedResponse);
    if (fallbackJson && fallbackJson !== cleanedResponse) {
      return JSON.parse(fallbackJson);
    }
    throw primaryError;
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results keep
 * input order. The first rejection stops new work from starting; calls already
 * running are awaited before it is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const pending = items.entries();
  const state: { failure?: { error: unknown } } = {};

  const worker = async (): Promise<void> => {
    for (let entry = pending.next(); !entry.done; entry = pending.next()) {
      const [index, item] = entry.value;
      try {
        results[index] = await fn(item, index);
      } catch (error) {
        state.failure ??= { error };
      }
      if (state.failure) return;
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);

  if (state.failure) {
    throw state.failure.error;
  }
  return results;
}
