/**
 * Code Rules
 *
 * Upper-case acronyms that classify a document: contract type (CCV, CPA),
 * document title (PROM, 1ADT), environmental document (CAR, ITR) and
 * identity document (RG, CNH). Lower-case occurrences are ordinary words.
 */

import { KeywordRule } from '../base-rule';
import { KEYWORDS } from '../keywords';

export const contractTypeRule = new KeywordRule({
  id: 'contract-type.code',
  field: 'contract_type',
  priority: 10,
  description: 'Contract type acronym (CPR is filed as CPA)',
  keywords: KEYWORDS.contractTypes,
  requireUppercase: true,
  canonicalize: (hit) => KEYWORDS.contractTypeAliases.get(hit) ?? hit,
});

export const documentTitleRule = new KeywordRule({
  id: 'document-title.code',
  field: 'document_title',
  priority: 10,
  description: 'Document title code (PROM, CONTR, 1ADT, ...)',
  keywords: KEYWORDS.documentTitles,
  requireUppercase: true,
});

export const environmentalDocumentRule = new KeywordRule({
  id: 'environmental-document.acronym',
  field: 'environmental_document',
  priority: 10,
  description: 'Environmental or land registry document acronym',
  keywords: KEYWORDS.environmentalDocuments,
  requireUppercase: true,
});

export const identityDocumentRule = new KeywordRule({
  id: 'identity-document.keyword',
  field: 'identity_document',
  priority: 10,
  description: 'Personal identity document kind',
  keywords: KEYWORDS.identityDocuments,
  requireUppercase: true,
});

export const codeRules = [contractTypeRule, documentTitleRule, environmentalDocumentRule, identityDocumentRule];
