/**
 * Document Type Rules
 *
 * The type keyword in the heading ("CONTRATO Nº 123 ...") is the strong
 * signal; the same keyword deeper in the body is a weak one.
 */

import { KeywordRule } from '../base-rule';
import { KEYWORDS } from '../keywords';

const HEADING_LENGTH = 60;

export const documentTypeHeadingRule = new KeywordRule({
  id: 'document-type.heading',
  field: 'document_type',
  priority: 10,
  description: 'First document type keyword within the heading',
  keywords: KEYWORDS.documentTypes,
  withinFirst: HEADING_LENGTH,
  firstOnly: true,
});

export const documentTypeKeywordRule = new KeywordRule({
  id: 'document-type.keyword',
  field: 'document_type',
  priority: 20,
  description: 'Document type keyword anywhere in the text',
  keywords: KEYWORDS.documentTypes,
});

export const documentTypeRules = [documentTypeHeadingRule, documentTypeKeywordRule];
