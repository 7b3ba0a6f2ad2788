// server/src/types.ts
export type PolicyRuleId = 'POL-1' | 'POL-2' | 'POL-3' | 'POL-4' | 'POL-5' | 'POL-6' | 'POL-7' | 'POL-8';

export type PolicyRule = {
  id: PolicyRuleId;
  text: string;
};

export type Chunk = {
  id: string;
  text: string;
  index: number;
  source: string;
};

export type CaseDocs = Record<string, unknown>;

export type CaseInput = {
  natureza?: string | null;
  // numeric strings are accepted; anything unparseable degrades to POL-8
  valorCondenacao?: number | string | null;
  transitadoEmJulgado?: boolean | null;
  fase?: string | null;
  docs?: CaseDocs | null;
};

export type DecisionOutcome = 'approved' | 'rejected' | 'incomplete';

export type Evaluation = {
  decision: DecisionOutcome;
  citations: PolicyRuleId[];
  reasons: string[];
};

export type Decision = Evaluation & {
  rationale: string;
};

export type MetadataValue = string | number | boolean | null;
export type Metadata = Record<string, MetadataValue>;

export type RetrievalResult = {
  ids: string[];
  documents: string[];
  metadatas: Metadata[];
  distances: number[];
};

export type PolicySource = {
  id: PolicyRuleId;
  text: string;
};
