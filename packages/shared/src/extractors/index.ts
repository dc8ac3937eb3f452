/**
 * Field Extraction Module
 *
 * Rule-based field extraction. Each rule targets one field with one
 * technique:
 * - 'keyword': dictionary hits (document types, acronyms, context words)
 * - 'pattern': regular patterns (reference numbers, years)
 * - 'date': calendar-validated dates
 * - 'entity': names after a label or around a company marker
 */

// Core types and interfaces
export type {
  ExtractionRule,
  RuleId,
  RuleMatch,
  ConfiguredRule,
  RuleSet,
  RuleSetOptions,
} from './types';
export { CONTEXT_HINT_RULE_ID } from './types';

// Base classes
export {
  BaseRule,
  KeywordRule,
  PatternRule,
  EntityRule,
  type KeywordRuleDefinition,
  type PatternRuleDefinition,
  type EntityRuleDefinition,
} from './base-rule';

// Registry
export {
  registerRule,
  getRule,
  getRuleOrThrow,
  hasRule,
  getRules,
  clearRegistry,
  getRegistryStats,
  buildRuleSet,
  ruleOrder,
} from './registry';

// Extraction
export { extractFields, type ExtractOptions } from './extract';
export { KEYWORDS, wordPattern } from './keywords';
export { captureEntity, splitSegments, scanAll, type ScanMatch } from './scan';

// Individual rules
export { documentTypeRules, documentTypeHeadingRule, documentTypeKeywordRule } from './document-type';
export { referenceNumberRules, referenceNumberLabeledRule, referenceNumberBareRule } from './reference-number';
export {
  dateRules,
  numericDateRule,
  writtenDateRule,
  isoDateRule,
  issueYearFromDateRule,
  issueYearStandaloneRule,
  isCalendarDate,
} from './date';
export { partyRules, partyLabeledRule, partyCompanyRule, CompanySegmentRule } from './party';
export { codeRules, contractTypeRule, documentTitleRule, environmentalDocumentRule, identityDocumentRule } from './codes';
export { entityRules, farmRule, partnerRule, fundRule, speRule, ownerRule } from './entities';
export { businessContextRules, fundsContextRule, marketContextRule, type BusinessContext } from './business-context';

// Import for registration
import { registerRule } from './registry';
import type { ExtractionRule } from './types';
import { documentTypeRules } from './document-type';
import { referenceNumberRules } from './reference-number';
import { dateRules } from './date';
import { partyRules } from './party';
import { codeRules } from './codes';
import { entityRules } from './entities';
import { businessContextRules } from './business-context';

/**
 * Register all built-in rules.
 * Call this again after clearRegistry() in tests.
 */
export function registerAllRules(): void {
  const rules: ExtractionRule[] = [
    ...documentTypeRules,
    ...referenceNumberRules,
    ...dateRules,
    ...partyRules,
    ...codeRules,
    ...entityRules,
    ...businessContextRules,
  ];
  for (const rule of rules) {
    registerRule(rule);
  }
}

// Auto-register all rules on module load
registerAllRules();
