/**
 * INPUT: 信用係數、期數、申請金額、搜尋步進
 * OUTPUT: 信用分數、該期數下最高可貸金額（百元取整）
 * POS: 服務層，決策引擎核心演算法
 */

/** 最高可貸金額無條件捨去的單位 */
const AMOUNT_ROUNDING_UNIT = 100;

/**
 * 信用分數 = 信用係數 × 期數 ÷ 金額
 * 分數 ≥ 1 即可核貸
 */
export function getCreditScore(creditModifier: number, loanPeriod: number, loanAmount: number): number {
  return (creditModifier * loanPeriod) / loanAmount;
}

/**
 * 固定期數下的最高可貸金額
 * - 分數 = 1：申請金額剛好是上限
 * - 分數 > 1：金額逐步加碼，直到分數 ≤ 1
 * - 分數 < 1：金額逐步減碼，直到分數 ≥ 1；減到 0 以下仍不足 → 0
 * 最後以「係數 × 期數 ÷ 分數」反推金額，並捨去至百元
 */
export function highestValidLoanAmount(
  creditModifier: number,
  loanPeriod: number,
  loanAmount: number,
  step: number,
): number {
  if (creditModifier <= 0) return 0;

  let amount = loanAmount;
  let creditScore = getCreditScore(creditModifier, loanPeriod, amount);

  if (creditScore > 1) {
    while (creditScore > 1) {
      amount += step;
      creditScore = getCreditScore(creditModifier, loanPeriod, amount);
    }
  } else if (creditScore < 1) {
    while (creditScore < 1) {
      if (amount - step <= 0) return 0;
      amount -= step;
      creditScore = getCreditScore(creditModifier, loanPeriod, amount);
    }
  }

  return (
    Math.floor((creditModifier * loanPeriod) / creditScore / AMOUNT_ROUNDING_UNIT) *
    AMOUNT_ROUNDING_UNIT
  );
}
