// ============================================
// Parameter bounds and defaults for the finance rules
// ============================================

export const SIP_LIMITS = {
  minAmount: 100,
  maxAmount: 1_000_000,
  minYears: 1,
  maxYears: 50,
  defaultAmount: 5000,
  defaultYears: 10,
  minReturnPercent: 1,
  maxReturnPercent: 30,
  defaultReturn: 0.12,
} as const;

export const EMI_LIMITS = {
  minLoan: 50_000,
  maxLoan: 100_000_000, // 10 crore
  minInterest: 1,
  maxInterest: 30,
  minTenure: 1,
  maxTenure: 30,
  defaultInterest: 8.5,
  defaultTenure: 20,
} as const;

export const AGE_LIMITS = {
  minAge: 18,
  maxAge: 80,
  minRetirementAge: 30,
  maxRetirementAge: 100,
  defaultAge: 30,
  defaultRetirementAge: 60,
} as const;

export const EXPENSE_LIMITS = {
  minMonthly: 1000,
  maxMonthly: 1_000_000,
  defaultMonthly: 50_000,
} as const;

export const INVESTMENT_LIMITS = {
  min: 1000,
  max: 100_000_000,
  defaultAmount: 100_000,
  defaultRiskAppetite: "moderate",
} as const;

export const FUND_CATEGORY_LIMIT = 10;
