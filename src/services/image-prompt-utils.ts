// Normalizes scene descriptions before they are sent to the image model.
export function refineImagePrompt(raw: string, opts: { maxLength?: number } = {}): string {
  const maxLength = opts.maxLength ?? 900;
  let prompt = raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^"|"$/g, '');

  // Ensure it describes a scene, not a command
  prompt = prompt.replace(/^(?:Imagine|Draw|Illustrate|Create an image of)\s+/i, '');

  // Cap length to avoid provider limits
  if (prompt.length > maxLength) {
    const cut = prompt.slice(0, maxLength);
    const lastPeriod = cut.lastIndexOf('.');
    prompt = lastPeriod > 60 ? cut.slice(0, lastPeriod + 1) : cut;
  }

  return prompt.replace(/[-,;:]+$/, '').trim();
}

// Builds a more neutral description aimed at avoiding safety blocks. Used when
// the model-based rewrite is unavailable.
export function buildSafeFallbackPrompt(original: string): string {
  let prompt = original;

  prompt = prompt.replace(/\b(?:blood|bloody|gore|gory|wound(?:ed)?|injur(?:y|ed|ies))\b/gi, '');
  prompt = prompt.replace(/\b(?:gun|guns|rifle|pistol|knife|knives|sword|swords|weapon|weapons)\b/gi, 'object');
  prompt = prompt.replace(/\b(?:kill(?:s|ed|ing)?|fight(?:s|ing)?|attack(?:s|ed|ing)?)\b/gi, 'confront');
  prompt = prompt.replace(/\b\d+\s*-?\s*(?:month|year)s?\s*-?\s*old\b/gi, 'young');

  if (!/safe|wholesome|cheerful/i.test(prompt)) {
    prompt += ' The scene is wholesome, safe, and cheerful.';
  }

  if (!/lighting|lit\b/i.test(prompt)) {
    prompt += ' Warm, gentle lighting.';
  }

  return refineImagePrompt(prompt);
}
