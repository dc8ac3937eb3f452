/**
 * Keyword dictionaries for the extraction rules (data/keywords.json).
 */

import keywordData from '../../data/keywords.json';

export const KEYWORDS = {
  documentTypes: keywordData.document_types,
  environmentalDocuments: keywordData.environmental_documents,
  contractTypes: keywordData.contract_types,
  contractTypeAliases: new Map<string, string>(Object.entries(keywordData.contract_type_aliases)),
  documentTitles: keywordData.document_titles,
  identityDocuments: keywordData.identity_documents,
  fundsKeywords: keywordData.context_keywords.funds,
  marketKeywords: keywordData.context_keywords.market,
  partyLabels: keywordData.party_labels,
  ownerLabels: keywordData.owner_labels,
  companyDesignators: new Set<string>(keywordData.company_designators),
  legalSuffixes: new Set<string>(keywordData.legal_suffixes),
  entityStopWords: new Set<string>(keywordData.entity_stop_words),
  months: keywordData.months,
};

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Whole-word alternation over lower-cased words, longest first so "1adt"
 * wins over "adt".
 */
export function wordPattern(words: readonly string[]): RegExp {
  const alternatives = [...words]
    .map((w) => w.toLowerCase())
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`(?<![\\w/.])(?:${alternatives})(?![\\w/])`, 'g');
}
