/**
 * Business Context Rules
 *
 * Whether a document belongs to the funds side (fundo, FIP, SPE) or the
 * market side (parceiro, fazenda) of the business. Selects naming variants.
 */

import { KeywordRule } from '../base-rule';
import { KEYWORDS } from '../keywords';

export type BusinessContext = 'funds' | 'market';

export const fundsContextRule = new KeywordRule({
  id: 'business-context.funds',
  field: 'business_context',
  priority: 10,
  description: 'Funds vocabulary',
  keywords: KEYWORDS.fundsKeywords,
  canonicalize: () => 'funds',
});

export const marketContextRule = new KeywordRule({
  id: 'business-context.market',
  field: 'business_context',
  priority: 20,
  description: 'Market vocabulary',
  keywords: KEYWORDS.marketKeywords,
  canonicalize: () => 'market',
});

export const businessContextRules = [fundsContextRule, marketContextRule];
