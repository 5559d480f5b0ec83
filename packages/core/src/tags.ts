/**
 * Tag handling: stack tags + model tags
 */

import { MAX_OBJECT_TAGS, ModelValidationError, type Tag } from './model.js';

/**
 * Stack-level tags first, then model tags.
 * A model tag replaces the value of a stack tag with the same key (the key keeps its position);
 * a key repeated within the model tags is rejected, as S3 rejects it.
 */
export function mergeTags(stackTags: Record<string, string> | undefined, modelTags: Tag[] | undefined): Tag[] {
  const merged = new Map<string, string>();

  for (const [key, value] of Object.entries(stackTags ?? {})) {
    merged.set(key, value);
  }
  const modelKeys = new Set<string>();
  for (const tag of modelTags ?? []) {
    if (modelKeys.has(tag.Key)) {
      throw new ModelValidationError(`Tag key ${tag.Key} appears more than once in Tags`);
    }
    modelKeys.add(tag.Key);
    merged.set(tag.Key, tag.Value);
  }

  if (merged.size > MAX_OBJECT_TAGS) {
    throw new ModelValidationError(
      `An S3 object accepts at most ${MAX_OBJECT_TAGS} tags, got ${merged.size} after merging stack tags`
    );
  }

  return Array.from(merged, ([Key, Value]) => ({ Key, Value }));
}
