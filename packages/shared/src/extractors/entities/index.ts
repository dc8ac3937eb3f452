/**
 * Entity Rules
 *
 * Names that follow a fixed label: "Fazenda Contendas", "parceiro Radial",
 * "Fundo Terra", "SPE Norte", "proprietário João Silva".
 */

import { EntityRule } from '../base-rule';
import { KEYWORDS } from '../keywords';

export const farmRule = new EntityRule({
  id: 'farm.labeled',
  field: 'farm',
  priority: 10,
  description: 'Farm name after "fazenda"',
  labels: ['fazenda'],
});

export const partnerRule = new EntityRule({
  id: 'partner.labeled',
  field: 'partner',
  priority: 10,
  description: 'Partner name after "parceiro"',
  labels: ['parceiro', 'parceira'],
});

export const fundRule = new EntityRule({
  id: 'fund.labeled',
  field: 'fund',
  priority: 10,
  description: 'Fund name after "fundo"',
  labels: ['fundo'],
});

export const speRule = new EntityRule({
  id: 'spe.labeled',
  field: 'spe',
  priority: 10,
  description: 'Special purpose entity name after "SPE"',
  labels: ['spe'],
});

export const ownerRule = new EntityRule({
  id: 'owner.labeled',
  field: 'owner',
  priority: 10,
  description: 'Owner name after "proprietário" or "CPF de"',
  labels: KEYWORDS.ownerLabels,
  maxTokens: 4,
});

export const entityRules = [farmRule, partnerRule, fundRule, speRule, ownerRule];
