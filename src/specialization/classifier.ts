import { readFileSync } from "node:fs";
import * as z from "zod";
import { SpecializationSchema, type Specialization } from "../types.js";

const KeywordSetsSchema = z
  .array(
    z.object({
      specialization: SpecializationSchema.exclude(["GeneralMaintenance"]),
      keywords: z.array(z.string().min(1)).nonempty(),
    }),
  )
  .nonempty();

export type KeywordSets = z.infer<typeof KeywordSetsSchema>;

/**
 * Keyword sets in priority order: the more specific trades come first so
 * that "dishwasher leaking water" is an appliance job, not a plumbing job.
 */
export const SPECIALIZATION_KEYWORDS: KeywordSets = KeywordSetsSchema.parse(
  JSON.parse(
    readFileSync(new URL("../../data/specialization-keywords.json", import.meta.url), "utf8"),
  ),
);

interface CompiledKeywordSet {
  specialization: Specialization;
  keywords: string[];
}

function compile(sets: KeywordSets): CompiledKeywordSet[] {
  return sets.map(({ specialization, keywords }) => ({
    specialization,
    keywords: keywords.map((k) => k.toLowerCase()),
  }));
}

const DEFAULT_COMPILED = compile(SPECIALIZATION_KEYWORDS);

/**
 * Determines the trade a request needs from its title and description.
 *
 * Keywords match as case-insensitive substrings, so "light" matches
 * "downlight". The first keyword set (in priority order) with a hit wins;
 * when nothing matches the work goes to General Maintenance.
 *
 * @param keywordSets - Replaces the bundled keyword sets
 *
 * @example
 * ```typescript
 * classifySpecialization("Kitchen sink", "Water dripping under the cabinet");
 * // "Plumbing"
 * ```
 */
export function classifySpecialization(
  title: string,
  description: string,
  keywordSets?: KeywordSets,
): Specialization {
  const text = `${title} ${description}`.trim().toLowerCase();
  if (!text) return "GeneralMaintenance";

  const compiled = keywordSets ? compile(KeywordSetsSchema.parse(keywordSets)) : DEFAULT_COMPILED;
  for (const set of compiled) {
    if (set.keywords.some((keyword) => text.includes(keyword))) return set.specialization;
  }
  return "GeneralMaintenance";
}
