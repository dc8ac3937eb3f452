/**
 * Party Rules
 *
 * A party is either named after a role label ("Contratante: Agro Sul") or
 * recognized as a company: a list segment that starts with a designator
 * ("Empresa XYZ") or ends in a legal suffix ("Agro Sul Ltda").
 */

import { BaseRule, EntityRule } from '../base-rule';
import { KEYWORDS } from '../keywords';
import { splitSegments, tokensIn } from '../scan';
import type { FieldName, NormalizedText, RuleKind, TextSpan } from '../../types';
import type { RuleId, RuleMatch } from '../types';

const MAX_COMPANY_TOKENS = 6;
const CONNECTORS = new Set(['e', 'de', 'da', 'do', 'das', 'dos']);
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/** Stop words for company names, which may contain connectors ("Cia de Gás") */
export const COMPANY_STOP_WORDS: ReadonlySet<string> = new Set([
  ...[...KEYWORDS.entityStopWords].filter((w) => !CONNECTORS.has(w)),
  ...KEYWORDS.partyLabels,
  ...KEYWORDS.ownerLabels,
  ...KEYWORDS.documentTypes.map((t) => t.toLowerCase()),
]);

export const partyLabeledRule = new EntityRule({
  id: 'party.labeled',
  field: 'party',
  priority: 10,
  description: 'Name after a contract role label (contratante, contratada, ...)',
  labels: KEYWORDS.partyLabels,
  maxTokens: 4,
});

interface Token {
  span: TextSpan;
  core: string;
  raw: string;
  /** First letter is a capital in the display copy */
  capitalized: boolean;
}

export class CompanySegmentRule extends BaseRule {
  readonly id: RuleId = 'party.company';
  readonly kind: RuleKind = 'entity';
  readonly field: FieldName = 'party';
  readonly priority = 20;
  readonly description = 'Company name identified by a designator or legal suffix';

  protected findMatches(text: NormalizedText): RuleMatch[] {
    const matches: RuleMatch[] = [];

    for (const segment of splitSegments(text)) {
      const tokens = this.tokenize(text, segment);
      const name = this.fromDesignator(tokens) ?? this.fromSuffix(tokens);
      if (!name) continue;

      const span = { start: name[0].span.start, end: name[name.length - 1].span.end };
      const value = text.display.slice(span.start, span.end);
      matches.push({ value, canonical: value, span });
    }

    return matches;
  }

  private tokenize(text: NormalizedText, segment: TextSpan): Token[] {
    return tokensIn(text, segment).map((span) => {
      const raw = text.matching.slice(span.start, span.end);
      const leading = raw.length - raw.replace(/^[^\p{L}\p{N}]+/u, '').length;
      const core = raw.replace(EDGE_PUNCTUATION, '');
      const first = text.display.charAt(span.start + leading);
      return {
        span: { start: span.start + leading, end: span.start + leading + core.length },
        core,
        raw,
        capitalized: first !== first.toLowerCase(),
      };
    });
  }

  /** Names are capitalized words joined by lower-case connectors */
  private isBoundary(token: Token): boolean {
    if (!token.core || COMPANY_STOP_WORDS.has(token.core) || /\d/.test(token.core)) return true;
    return !token.capitalized && !CONNECTORS.has(token.core);
  }

  /** "Empresa XYZ", "Cia Agro Sul de Grãos" */
  private fromDesignator(tokens: Token[]): Token[] | null {
    const first = tokens.findIndex((t) => KEYWORDS.companyDesignators.has(t.core));
    if (first < 0) return null;

    const name = [tokens[first]];
    for (const token of tokens.slice(first + 1)) {
      if (this.isBoundary(token) || name.length >= MAX_COMPANY_TOKENS) break;
      name.push(token);
      if (/[,;:]$/.test(token.raw)) break;
    }

    return this.trimConnectors(name, 2);
  }

  /** "Agro Sul Ltda", "Transportes de Cargas S/A" */
  private fromSuffix(tokens: Token[]): Token[] | null {
    const last = tokens.findIndex((t) => this.isLegalSuffix(t));
    if (last <= 0) return null;

    const name = [tokens[last]];
    for (let i = last - 1; i >= 0; i--) {
      const token = tokens[i];
      if (this.isBoundary(token) || token.raw.endsWith(':') || name.length >= MAX_COMPANY_TOKENS) break;
      name.unshift(token);
    }

    return this.trimConnectors(name, 2);
  }

  /** Suffixes count only when written with a capital ("ME", not "me") */
  private isLegalSuffix(token: Token): boolean {
    return token.capitalized && KEYWORDS.legalSuffixes.has(token.core);
  }

  private trimConnectors(name: Token[], minTokens: number): Token[] | null {
    let start = 0;
    let end = name.length;
    while (start < end && CONNECTORS.has(name[start].core)) start++;
    while (end > start && CONNECTORS.has(name[end - 1].core)) end--;
    const trimmed = name.slice(start, end);
    return trimmed.length >= minTokens ? trimmed : null;
  }
}

export const partyCompanyRule = new CompanySegmentRule();

export const partyRules = [partyLabeledRule, partyCompanyRule];
