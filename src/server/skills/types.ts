export type DescriptorKind = "skill" | "agent";

export type SkillDescriptor = {
  readonly kind: "skill";
  readonly name: string;
  readonly description: string;
  readonly categories: readonly string[];
  readonly languages: readonly string[];
  readonly resourceRefs: readonly string[];
  readonly body: string;
  readonly sourcePath: string;
  readonly lastModified: number;
};

export type AgentDescriptor = {
  readonly kind: "agent";
  readonly name: string;
  readonly description: string;
  readonly declaredCategories: readonly string[];
  readonly body: string;
  readonly sourcePath: string;
  readonly lastModified: number;
};

export type Descriptor = SkillDescriptor | AgentDescriptor;

export type DescriptorErrorCode =
  | "MalformedHeaderError"
  | "MissingFieldError"
  | "InvalidNameError"
  | "EmptyCategoriesError"
  | "NameMismatchError"
  | "MissingDescriptorError"
  | "UnreadableFileError"
  | "DescriptorTooLargeError";

export type ScanFileError = {
  readonly path: string;
  readonly code: DescriptorErrorCode;
  readonly message: string;
};

export type ScanResult = {
  root: string;
  descriptors: Descriptor[];
  errors: ScanFileError[];
  warnings: string[];
};

export type DuplicateNameWarning = {
  readonly kind: "DuplicateNameWarning";
  readonly descriptorKind: DescriptorKind;
  readonly name: string;
  readonly keptPath: string;
  readonly duplicatePath: string;
};

export type RegistrySnapshot = {
  readonly generation: number;
  readonly builtAt: number;
  readonly roots: readonly string[];
  readonly skills: readonly SkillDescriptor[];
  readonly agents: readonly AgentDescriptor[];
  readonly byName: ReadonlyMap<string, SkillDescriptor>;
  readonly byCategory: ReadonlyMap<string, readonly string[]>;
  readonly byLanguage: ReadonlyMap<string, readonly string[]>;
  /** Skills that declare no languages and so match any requested language. */
  readonly agnostic: readonly string[];
  readonly errors: readonly ScanFileError[];
  readonly duplicates: readonly DuplicateNameWarning[];
  readonly warnings: readonly string[];
};

export type MatchRequest = {
  language?: string | null;
  categories?: readonly string[];
  keywords?: readonly string[];
};

export type NormalizedMatchRequest = {
  readonly language: string | null;
  readonly categories: readonly string[];
  readonly keywords: readonly string[];
};

export type NoMatchForCategory = {
  readonly kind: "NoMatchForCategory";
  readonly category: string;
  /** Candidates indexed under the category before language filtering. */
  readonly candidates: number;
  readonly filteredByLanguage: number;
};

export type MatchSlot = {
  readonly category: string;
  readonly skill: SkillDescriptor | null;
  readonly score: number | null;
  readonly matchedCategory: string | null;
  readonly matchedKeywords: readonly string[];
};

export type MatchResult = {
  readonly generation: number;
  readonly request: NormalizedMatchRequest;
  readonly slots: readonly MatchSlot[];
  readonly notes: readonly NoMatchForCategory[];
};

export type ScoredCandidate = {
  readonly skill: SkillDescriptor;
  readonly score: number;
  readonly matchedKeywords: readonly string[];
};
