export const LOAN_LEDGER = "LOAN_LEDGER";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
