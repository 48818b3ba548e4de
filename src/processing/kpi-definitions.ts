import type { Decimal } from 'decimal.js';
import type { UnitKind } from '../core/types.js';
import { divide } from './calculations.js';

/**
 * Derived metric definitions.
 *
 * Each KPI is a pure function of named inputs, which are base concepts
 * or other KPIs. The registry checks at startup that the table is a DAG.
 */

export interface KpiDefinition {
  name: string;
  display_name: string;
  description: string;
  inputs: string[];
  unit: string;
  unit_type: UnitKind;
  /** Human-readable formula, shown in the calculation trace */
  formula: string;
  compute: (v: Record<string, Decimal>) => Decimal;
}

export const KPI_DEFINITIONS: KpiDefinition[] = [
  {
    name: 'grossProfit',
    display_name: 'Gross Profit',
    description: 'Revenue minus cost of revenue',
    inputs: ['revenue', 'costOfRevenue'],
    unit: 'USD',
    unit_type: 'currency',
    formula: 'revenue - costOfRevenue',
    compute: v => v.revenue.minus(v.costOfRevenue),
  },
  {
    name: 'grossMargin',
    display_name: 'Gross Margin',
    description: 'Gross profit as a fraction of revenue',
    inputs: ['grossProfit', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'grossProfit / revenue',
    compute: v => divide(v.grossProfit, v.revenue, 'revenue'),
  },
  {
    name: 'operatingMargin',
    display_name: 'Operating Margin',
    description: 'Operating income as a fraction of revenue',
    inputs: ['operatingIncome', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'operatingIncome / revenue',
    compute: v => divide(v.operatingIncome, v.revenue, 'revenue'),
  },
  {
    name: 'netMargin',
    display_name: 'Net Profit Margin',
    description: 'Net income as a fraction of revenue',
    inputs: ['netIncome', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'netIncome / revenue',
    compute: v => divide(v.netIncome, v.revenue, 'revenue'),
  },
  {
    name: 'ebitda',
    display_name: 'EBITDA',
    description: 'Operating income plus depreciation and amortization',
    inputs: ['operatingIncome', 'depreciationAndAmortization'],
    unit: 'USD',
    unit_type: 'currency',
    formula: 'operatingIncome + depreciationAndAmortization',
    compute: v => v.operatingIncome.plus(v.depreciationAndAmortization),
  },
  {
    name: 'ebitdaMargin',
    display_name: 'EBITDA Margin',
    description: 'EBITDA as a fraction of revenue',
    inputs: ['ebitda', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'ebitda / revenue',
    compute: v => divide(v.ebitda, v.revenue, 'revenue'),
  },
  {
    name: 'freeCashFlow',
    display_name: 'Free Cash Flow',
    description: 'Operating cash flow minus capital expenditures',
    inputs: ['operatingCashFlow', 'capitalExpenditures'],
    unit: 'USD',
    unit_type: 'currency',
    formula: 'operatingCashFlow - capitalExpenditures',
    compute: v => v.operatingCashFlow.minus(v.capitalExpenditures),
  },
  {
    name: 'fcfMargin',
    display_name: 'FCF Margin',
    description: 'Free cash flow as a fraction of revenue',
    inputs: ['freeCashFlow', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'freeCashFlow / revenue',
    compute: v => divide(v.freeCashFlow, v.revenue, 'revenue'),
  },
  {
    name: 'rdIntensity',
    display_name: 'R&D Intensity',
    description: 'R&D spending as a fraction of revenue',
    inputs: ['researchAndDevelopment', 'revenue'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'researchAndDevelopment / revenue',
    compute: v => divide(v.researchAndDevelopment, v.revenue, 'revenue'),
  },
  {
    name: 'returnOnEquity',
    display_name: 'Return on Equity',
    description: 'Net income divided by stockholders equity',
    inputs: ['netIncome', 'stockholdersEquity'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'netIncome / stockholdersEquity',
    compute: v => divide(v.netIncome, v.stockholdersEquity, 'stockholdersEquity'),
  },
  {
    name: 'returnOnAssets',
    display_name: 'Return on Assets',
    description: 'Net income divided by total assets',
    inputs: ['netIncome', 'totalAssets'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'netIncome / totalAssets',
    compute: v => divide(v.netIncome, v.totalAssets, 'totalAssets'),
  },
  {
    name: 'currentRatio',
    display_name: 'Current Ratio',
    description: 'Current assets divided by current liabilities',
    inputs: ['currentAssets', 'currentLiabilities'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'currentAssets / currentLiabilities',
    compute: v => divide(v.currentAssets, v.currentLiabilities, 'currentLiabilities'),
  },
  {
    name: 'debtToEquity',
    display_name: 'Debt-to-Equity',
    description: 'Total liabilities divided by stockholders equity',
    inputs: ['totalLiabilities', 'stockholdersEquity'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'totalLiabilities / stockholdersEquity',
    compute: v => divide(v.totalLiabilities, v.stockholdersEquity, 'stockholdersEquity'),
  },
  {
    name: 'interestCoverage',
    display_name: 'Interest Coverage',
    description: 'Operating income divided by interest expense',
    inputs: ['operatingIncome', 'interestExpense'],
    unit: 'ratio',
    unit_type: 'ratio',
    formula: 'operatingIncome / interestExpense',
    compute: v => divide(v.operatingIncome, v.interestExpense, 'interestExpense'),
  },
];
