import type {
  MatchRequest,
  MatchResult,
  MatchSlot,
  NoMatchForCategory,
  NormalizedMatchRequest,
  RegistrySnapshot,
  ScoredCandidate,
  SkillDescriptor,
} from "./types";

/** Slot category used when a request names no categories. */
export const ANY_CATEGORY = "*";

export const BASE_SCORE = 100;
export const KEYWORD_BONUS = 10;

function normalizeTag(value: unknown): string {
  return String(value ?? "")
    .trim()
    .toLowerCase();
}

export function normalizeMatchRequest(request: MatchRequest): NormalizedMatchRequest {
  const language = normalizeTag(request.language);

  const categories = (request.categories ?? []).map(normalizeTag).filter(Boolean);

  const keywords: string[] = [];
  const seen = new Set<string>();
  for (const raw of request.keywords ?? []) {
    const keyword = normalizeTag(raw);
    if (!keyword || seen.has(keyword)) continue;
    seen.add(keyword);
    keywords.push(keyword);
  }

  return {
    language: language || null,
    categories: categories.length > 0 ? categories : [ANY_CATEGORY],
    keywords,
  };
}

function byName(a: SkillDescriptor, b: SkillDescriptor): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function candidatesFor(snapshot: RegistrySnapshot, category: string): SkillDescriptor[] {
  if (category === ANY_CATEGORY) return [...snapshot.skills];
  const names = snapshot.byCategory.get(category) ?? [];
  const out: SkillDescriptor[] = [];
  for (const name of names) {
    const skill = snapshot.byName.get(name);
    if (skill) out.push(skill);
  }
  return out;
}

function acceptsLanguage(skill: SkillDescriptor, language: string | null): boolean {
  if (!language) return true;
  if (skill.languages.length === 0) return true;
  return skill.languages.includes(language);
}

function scoreCandidate(skill: SkillDescriptor, keywords: readonly string[]): ScoredCandidate {
  const description = skill.description.toLowerCase();
  const matchedKeywords = keywords.filter((keyword) => description.includes(keyword));
  return {
    skill,
    score: BASE_SCORE + KEYWORD_BONUS * matchedKeywords.length,
    matchedKeywords,
  };
}

function rankNormalized(
  snapshot: RegistrySnapshot,
  category: string,
  request: NormalizedMatchRequest
): { ranked: ScoredCandidate[]; candidates: number } {
  const candidates = candidatesFor(snapshot, category);
  const ranked = candidates
    .filter((skill) => acceptsLanguage(skill, request.language))
    .map((skill) => scoreCandidate(skill, request.keywords))
    .sort((a, b) => b.score - a.score || byName(a.skill, b.skill));
  return { ranked, candidates: candidates.length };
}

/**
 * Every candidate for one category, best first. Ties fall back to ascending
 * skill name.
 */
export function rankCandidates(
  snapshot: RegistrySnapshot,
  category: string,
  request: MatchRequest = {}
): ScoredCandidate[] {
  const normalized = normalizeMatchRequest(request);
  return rankNormalized(snapshot, normalizeTag(category) || ANY_CATEGORY, normalized).ranked;
}

export function resolve(snapshot: RegistrySnapshot, request: MatchRequest): MatchResult {
  const normalized = normalizeMatchRequest(request);
  const slots: MatchSlot[] = [];
  const notes: NoMatchForCategory[] = [];

  for (const category of normalized.categories) {
    const { ranked, candidates } = rankNormalized(snapshot, category, normalized);
    const best = ranked[0];

    if (!best) {
      notes.push({
        kind: "NoMatchForCategory",
        category,
        candidates,
        filteredByLanguage: candidates,
      });
      slots.push({
        category,
        skill: null,
        score: null,
        matchedCategory: null,
        matchedKeywords: [],
      });
      continue;
    }

    slots.push({
      category,
      skill: best.skill,
      score: best.score,
      matchedCategory: category === ANY_CATEGORY ? (best.skill.categories[0] ?? null) : category,
      matchedKeywords: best.matchedKeywords,
    });
  }

  return {
    generation: snapshot.generation,
    request: normalized,
    slots,
    notes,
  };
}
