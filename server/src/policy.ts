import { PolicyRule, PolicyRuleId, PolicySource } from './types';

export const POLICY_COLLECTION = 'policy';

const RULES: PolicyRule[] = [
  { id: 'POL-1', text: 'Só compramos crédito de processos transitados em julgado e em fase de execução.' },
  { id: 'POL-2', text: 'Exigir valor de condenação informado.' },
  { id: 'POL-3', text: 'Valor de condenação inferior a R$ 1.000,00 → não compra.' },
  { id: 'POL-4', text: 'Condenações na esfera trabalhista → não compra.' },
  { id: 'POL-5', text: 'Óbito do autor sem habilitação no inventário → não compra.' },
  { id: 'POL-6', text: 'Substabelecimento sem reserva de poderes → não compra.' },
  { id: 'POL-7', text: 'Informar honorários contratuais, periciais e sucumbenciais quando existirem.' },
  { id: 'POL-8', text: 'Se faltar documento essencial (ex.: trânsito em julgado não comprovado) → marcar como incomplete.' },
];

export const POLICY_RULES: readonly Readonly<PolicyRule>[] = Object.freeze(RULES.map((rule) => Object.freeze({ ...rule })));

const RULE_MAP: ReadonlyMap<PolicyRuleId, string> = new Map(
  POLICY_RULES.map((r): [PolicyRuleId, string] => [r.id, r.text]),
);

export function ruleTexts(citations: readonly PolicyRuleId[]): string[] {
  const out: string[] = [];
  for (const c of citations) {
    const text = RULE_MAP.get(c);
    if (text) out.push(text);
  }
  return out;
}

export function policySources(citations: readonly PolicyRuleId[]): PolicySource[] {
  return citations.map((c) => ({ id: c, text: RULE_MAP.get(c) ?? '' }));
}
