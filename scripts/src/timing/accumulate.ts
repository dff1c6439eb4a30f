import type { Accumulators, TagCategory, TagSets, TimingSample } from "lib/timing/types.js";

export function createAccumulators(tagSets: TagSets): Accumulators {
  const seed = (tags: string[]) => new Map<string, number[]>(tags.map((tag) => [tag, []]));
  return {
    write: seed(tagSets.write),
    read: seed(tagSets.read),
    residual: seed(tagSets.residual)
  };
}

/** Write tags win over read tags; anything in neither set is residual. */
export function classifyTag(tag: string, tagSets: TagSets): TagCategory {
  if (tagSets.write.includes(tag)) {
    return "write";
  }
  if (tagSets.read.includes(tag)) {
    return "read";
  }
  return "residual";
}

export interface AccumulateResult {
  category: TagCategory;
  // true the first time a residual tag outside the watch-list is stored
  newUnseededTag: boolean;
}

export function accumulateSample(
  accumulators: Accumulators,
  tagSets: TagSets,
  sample: TimingSample
): AccumulateResult {
  const category = classifyTag(sample.tag, tagSets);
  const target = accumulators[category];
  const existing = target.get(sample.tag);
  if (existing) {
    existing.push(sample.value);
    return { category, newUnseededTag: false };
  }
  target.set(sample.tag, [sample.value]);
  return { category, newUnseededTag: category === "residual" };
}

export function unseededResidualTags(accumulators: Accumulators, tagSets: TagSets): string[] {
  const watchList = new Set(tagSets.residual);
  // Map iteration follows insertion order, so this is first-seen order
  return Array.from(accumulators.residual.keys()).filter((tag) => !watchList.has(tag));
}
