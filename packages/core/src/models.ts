export type VibeName = 'Professional' | 'Friendly' | 'Persuasive' | 'Concise' | 'Empathetic';

export type VibeSpec = {
  name: VibeName;
  guidance: string;
};

export type GroundingDocument = {
  title: string;
  text: string;
  relevance: number;
};

export type Candidate = {
  vibe: VibeName;
  rewritten_text: string;
  explanation: string;
  use_cases: string[];
  score?: number;
};

export type RankedCandidate = Candidate & { score: number };

export type PlatformRules = {
  max_chars: number;
  hashtags_max: number;
  linebreaks_ok: boolean;
};

export type ValidationIssue = 'trimmed_to_max_chars' | 'removed_extra_hashtags' | 'removed_linebreaks';

export type ValidationOutcome = {
  text: string;
  issues: ValidationIssue[];
  rules: PlatformRules;
};

export type FailureKind =
  | 'provider_unavailable'
  | 'malformed_response'
  | 'contract_violation'
  | 'grounding_failure'
  | 'ranking_contract_violation';

export type Failure = {
  kind: FailureKind;
  detail: string;
};

export type Attempt<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export type CompletionOptions = {
  temperature: number;
  signal?: AbortSignal;
};

/** Any chat-completion backend. Returns the provider's raw text, unvalidated. */
export type GenerationService = {
  name: string;
  complete(system: string, user: string, options: CompletionOptions): Promise<string>;
};

export type GroundingQuery = {
  query: string;
  platform?: string | null;
  userId?: string | null;
  topK: number;
  /** Aborts on request cancellation or the grounding timeout. */
  signal?: AbortSignal;
};

export type GroundingStore = {
  retrieve(query: GroundingQuery): Promise<GroundingDocument[]>;
};

export type PlatformRulesProvider = {
  getRules(platform?: string | null): PlatformRules;
};

export type VibeTemplateProvider = {
  list(): readonly VibeSpec[];
};
