import * as jsonLogic from 'json-logic-js';
import type { AdditionalOperation, RulesLogic } from 'json-logic-js';
import { CaseDocs, CaseInput, DecisionOutcome, Evaluation, PolicyRuleId } from './types';

export const LABOR_KEYWORDS = ['trabalh', 'labor', 'labour'];
export const EXECUTION_KEYWORD = 'execu';
export const MIN_AWARD = 1000;
const FINALITY_PROOF_FLAGS = ['comprovante_transito', 'comprovanteTransito'];

export type Award = { status: 'absent' } | { status: 'invalid' } | { status: 'valid'; amount: number };

export type CaseFacts = {
  natureza: string;
  valorStatus: Award['status'];
  valor: number;
  transitado: 'final' | 'not_final' | 'unknown';
  temComprovanteTransito: boolean;
  fase: string;
};

type Logic = RulesLogic<AdditionalOperation>;

type PolicyCheck = {
  id: string;
  when: Logic;
  cites: PolicyRuleId;
  reason: string;
};

// Order matters: reasons are reported in this sequence.
const CHECKS: readonly PolicyCheck[] = [
  {
    id: 'labor-origin',
    when: { or: LABOR_KEYWORDS.map((k): Logic => ({ in: [k, { var: 'natureza' }] })) },
    cites: 'POL-4',
    reason: 'labor-origin credit',
  },
  {
    id: 'award-below-minimum',
    when: { and: [{ '==': [{ var: 'valorStatus' }, 'valid'] }, { '<': [{ var: 'valor' }, MIN_AWARD] }] },
    cites: 'POL-3',
    reason: 'award below minimum threshold',
  },
  {
    id: 'award-invalid',
    when: { '==': [{ var: 'valorStatus' }, 'invalid'] },
    cites: 'POL-8',
    reason: 'invalid or missing award value',
  },
  {
    id: 'not-final',
    when: { '==': [{ var: 'transitado' }, 'not_final'] },
    cites: 'POL-1',
    reason: 'case not final/res judicata',
  },
  {
    id: 'finality-unproven',
    when: { and: [{ '==': [{ var: 'transitado' }, 'unknown'] }, { '!': { var: 'temComprovanteTransito' } }] },
    cites: 'POL-8',
    reason: 'missing proof of finality',
  },
  {
    id: 'not-execution-phase',
    when: { and: [{ '!!': { var: 'fase' } }, { '!': { in: [EXECUTION_KEYWORD, { var: 'fase' }] } }] },
    cites: 'POL-1',
    reason: 'not in execution phase',
  },
  {
    id: 'phase-missing',
    when: { '!': { var: 'fase' } },
    cites: 'POL-8',
    reason: 'phase not informed',
  },
];

// plain decimal notation only; "500,50" is not a number
const NUMERIC = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

export function parseAward(value: unknown): Award {
  if (value === undefined || value === null) return { status: 'absent' };
  if (typeof value === 'number') return Number.isFinite(value) ? { status: 'valid', amount: value } : { status: 'invalid' };
  if (typeof value === 'string') {
    const s = value.trim();
    if (!NUMERIC.test(s)) return { status: 'invalid' };
    const amount = Number(s);
    return Number.isFinite(amount) ? { status: 'valid', amount } : { status: 'invalid' };
  }
  return { status: 'invalid' };
}

// any truthy, non-empty value is proof ("sim", 1, a file name)
function isFlagSet(v: unknown): boolean {
  if (v === undefined || v === null) return false;
  if (typeof v === 'string') return v.length > 0;
  if (typeof v === 'number') return v !== 0 && !Number.isNaN(v);
  if (Array.isArray(v)) return v.length > 0;
  if (typeof v === 'object') return Object.keys(v).length > 0;
  return Boolean(v);
}

function hasFinalityProof(docs: CaseDocs | null | undefined): boolean {
  if (!docs) return false;
  return FINALITY_PROOF_FLAGS.some((flag) => isFlagSet(docs[flag]));
}

export function toFacts(input: CaseInput): CaseFacts {
  const award = parseAward(input.valorCondenacao);
  const t = input.transitadoEmJulgado;
  return {
    natureza: (input.natureza ?? '').trim().toLowerCase(),
    valorStatus: award.status,
    valor: award.status === 'valid' ? award.amount : 0,
    transitado: t === true ? 'final' : t === false ? 'not_final' : 'unknown',
    temComprovanteTransito: hasFinalityProof(input.docs),
    fase: (input.fase ?? '').trim().toLowerCase(),
  };
}

export function dedupe<T>(seq: readonly T[]): T[] {
  return Array.from(new Set(seq));
}

export function decide(citations: readonly PolicyRuleId[], transitadoEmJulgado: boolean | null | undefined): DecisionOutcome {
  const cited = (id: PolicyRuleId) => citations.includes(id);
  if (cited('POL-4') || cited('POL-3') || transitadoEmJulgado === false || (cited('POL-1') && !cited('POL-8'))) {
    return 'rejected';
  }
  if (cited('POL-8')) return 'incomplete';
  return 'approved';
}

/**
 * Applies the credit-purchase policy to a case. Never throws: malformed or
 * missing fields become POL-8 citations.
 */
export function evaluate(input: CaseInput): Evaluation {
  const facts = toFacts(input);
  const citations: PolicyRuleId[] = [];
  const reasons: string[] = [];

  for (const check of CHECKS) {
    let hit: unknown;
    try {
      hit = jsonLogic.apply(check.when, facts);
    } catch (e) {
      console.warn(`[judge] check ${check.id} failed:`, e instanceof Error ? e.message : e);
      citations.push('POL-8');
      reasons.push(`rule check failed: ${check.id}`);
      continue;
    }
    if (hit === true) {
      citations.push(check.cites);
      reasons.push(check.reason);
    }
  }

  const unique = dedupe(citations);
  return { decision: decide(unique, input.transitadoEmJulgado), citations: unique, reasons };
}
