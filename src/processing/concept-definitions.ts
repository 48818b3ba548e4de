import type { ConceptDefinition } from '../core/types.js';

/**
 * Base concepts: the line items adapters fetch directly.
 *
 * XBRL concepts are ordered by priority (try first = priority 1).
 * Multiple concepts exist because the SEC taxonomy evolves and companies
 * sometimes use different tags for the same economic meaning.
 */

const gaap = (...concepts: string[]) =>
  concepts.map((concept, i) => ({ taxonomy: 'us-gaap', concept, priority: i + 1 }));

export const CONCEPT_DEFINITIONS: ConceptDefinition[] = [
  {
    id: 'revenue',
    display_name: 'Revenue',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap(
      'RevenueFromContractWithCustomerExcludingAssessedTax',
      'Revenues',
      'SalesRevenueNet',
      'RevenueFromContractWithCustomerIncludingAssessedTax',
    ),
  },
  {
    id: 'costOfRevenue',
    display_name: 'Cost of Revenue',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap('CostOfGoodsAndServicesSold', 'CostOfRevenue', 'CostOfGoodsSold', 'CostOfServices'),
  },
  {
    id: 'operatingIncome',
    display_name: 'Operating Income',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: true,
    live: false,
    xbrl_concepts: gaap('OperatingIncomeLoss'),
  },
  {
    id: 'netIncome',
    display_name: 'Net Income',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: true,
    live: false,
    xbrl_concepts: gaap('NetIncomeLoss', 'ProfitLoss', 'NetIncomeLossAvailableToCommonStockholdersBasic'),
  },
  {
    id: 'depreciationAndAmortization',
    display_name: 'Depreciation & Amortization',
    statement_type: 'cash_flow',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap('DepreciationDepletionAndAmortization', 'DepreciationAndAmortization', 'DepreciationAmortizationAndAccretionNet'),
  },
  {
    id: 'interestExpense',
    display_name: 'Interest Expense',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap('InterestExpense', 'InterestExpenseNonoperating', 'InterestExpenseDebt'),
  },
  {
    id: 'researchAndDevelopment',
    display_name: 'R&D Expense',
    statement_type: 'income_statement',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap('ResearchAndDevelopmentExpense', 'ResearchAndDevelopmentExpenseExcludingAcquiredInProcessCost'),
  },
  {
    id: 'operatingCashFlow',
    display_name: 'Operating Cash Flow',
    statement_type: 'cash_flow',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: true,
    live: false,
    xbrl_concepts: gaap('NetCashProvidedByUsedInOperatingActivities', 'NetCashProvidedByUsedInOperatingActivitiesContinuingOperations'),
  },
  {
    id: 'capitalExpenditures',
    display_name: 'Capital Expenditures',
    statement_type: 'cash_flow',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'flow',
    signed: false,
    live: false,
    xbrl_concepts: gaap('PaymentsToAcquirePropertyPlantAndEquipment', 'PaymentsToAcquireProductiveAssets'),
  },
  {
    id: 'totalAssets',
    display_name: 'Total Assets',
    statement_type: 'balance_sheet',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: false,
    live: false,
    xbrl_concepts: gaap('Assets'),
  },
  {
    id: 'totalLiabilities',
    display_name: 'Total Liabilities',
    statement_type: 'balance_sheet',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: false,
    live: false,
    xbrl_concepts: gaap('Liabilities'),
  },
  {
    id: 'stockholdersEquity',
    display_name: 'Stockholders Equity',
    statement_type: 'balance_sheet',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: true,
    live: false,
    xbrl_concepts: gaap('StockholdersEquity', 'StockholdersEquityIncludingPortionAttributableToNoncontrollingInterest'),
  },
  {
    id: 'currentAssets',
    display_name: 'Current Assets',
    statement_type: 'balance_sheet',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: false,
    live: false,
    xbrl_concepts: gaap('AssetsCurrent'),
  },
  {
    id: 'currentLiabilities',
    display_name: 'Current Liabilities',
    statement_type: 'balance_sheet',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: false,
    live: false,
    xbrl_concepts: gaap('LiabilitiesCurrent'),
  },
  {
    id: 'marketCap',
    display_name: 'Market Capitalization',
    statement_type: 'market',
    unit: 'USD',
    unit_type: 'currency',
    aggregation: 'instant',
    signed: false,
    live: true,
    xbrl_concepts: [],
  },
];

export function getConceptDefinition(id: string): ConceptDefinition | undefined {
  return CONCEPT_DEFINITIONS.find(c => c.id === id);
}

export function isConcept(name: string): boolean {
  return CONCEPT_DEFINITIONS.some(c => c.id === name);
}
