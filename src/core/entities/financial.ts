export const statementKinds = [
  "profit_and_loss",
  "balance_sheet",
  "cash_flow",
] as const;

export type StatementKind = (typeof statementKinds)[number];

/**
 * Closed vocabulary of line-item keys. Downstream consumers depend on these names verbatim.
 */
export const canonicalLabels = [
  "revenue",
  "other_income",
  "total_income",
  "total_expenses",
  "ebitda",
  "depreciation",
  "finance_costs",
  "profit_before_tax",
  "tax_expense",
  "net_profit",
  "total_assets",
  "current_assets",
  "non_current_assets",
  "cash_and_equivalents",
  "inventories",
  "trade_receivables",
  "total_liabilities",
  "current_liabilities",
  "non_current_liabilities",
  "borrowings",
  "total_equity",
  "operating_cash_flow",
  "investing_cash_flow",
  "financing_cash_flow",
  "capital_expenditure",
] as const;

export type CanonicalLabel = (typeof canonicalLabels)[number];

export const statementOfLabel: Record<CanonicalLabel, StatementKind> = {
  revenue: "profit_and_loss",
  other_income: "profit_and_loss",
  total_income: "profit_and_loss",
  total_expenses: "profit_and_loss",
  ebitda: "profit_and_loss",
  depreciation: "profit_and_loss",
  finance_costs: "profit_and_loss",
  profit_before_tax: "profit_and_loss",
  tax_expense: "profit_and_loss",
  net_profit: "profit_and_loss",
  total_assets: "balance_sheet",
  current_assets: "balance_sheet",
  non_current_assets: "balance_sheet",
  cash_and_equivalents: "balance_sheet",
  inventories: "balance_sheet",
  trade_receivables: "balance_sheet",
  total_liabilities: "balance_sheet",
  current_liabilities: "balance_sheet",
  non_current_liabilities: "balance_sheet",
  borrowings: "balance_sheet",
  total_equity: "balance_sheet",
  operating_cash_flow: "cash_flow",
  investing_cash_flow: "cash_flow",
  financing_cash_flow: "cash_flow",
  capital_expenditure: "cash_flow",
};

const canonicalLabelSet: ReadonlySet<string> = new Set(canonicalLabels);

export const isCanonicalLabel = (value: string): value is CanonicalLabel =>
  canonicalLabelSet.has(value);

/**
 * Label matching is either a hit on the closed vocabulary or an explicit miss.
 */
export type LabelMatch =
  | { kind: "matched"; label: CanonicalLabel; normalized: string }
  | { kind: "unmatched"; normalized: string };

export type LineItem = {
  label: CanonicalLabel;
  sourceLabel: string;
  page: number;
  values: Record<string, number>;
};

export type Statement = {
  kind: StatementKind;
  /** Most recent period first. */
  periods: string[];
  lineItems: Partial<Record<CanonicalLabel, LineItem>>;
};

export type FinancialStatements = Record<StatementKind, Statement>;

export type UnitScale = {
  unit: string;
  multiplier: number;
};

export type ParsedFinancials = {
  statements: FinancialStatements;
  unitScale: UnitScale;
  matchedRows: number;
};
