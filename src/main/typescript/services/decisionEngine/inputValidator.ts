/**
 * INPUT: LoanRequest、DecisionContext
 * OUTPUT: 驗證通過，或第一個不合格項目的 RejectedDecision
 * POS: 服務層，評分前的輸入檢核（身分證號 → 年齡 → 金額 → 期數）
 */

import { DecisionErrorCode } from '../../models/enums';
import { DecisionContext, LoanRequest, RejectedDecision } from '../../models/decision';
import { getAge, isValidPersonalCode } from '../../utils/personalCode';
import { reject } from './rejection';

/**
 * 依序檢核，遇到第一個不合格項目即回傳
 * 檢核順序影響前端顯示的訊息，不可調換
 */
export function verifyInputs(
  req: LoanRequest,
  ctx: DecisionContext,
): { valid: true } | { valid: false; rejection: RejectedDecision } {
  const { personalCode, loanAmount, loanPeriod } = req;
  const { constants, now } = ctx;

  if (!isValidPersonalCode(personalCode)) {
    return { valid: false, rejection: reject(DecisionErrorCode.INVALID_PERSONAL_CODE) };
  }

  const age = getAge(personalCode, now);
  if (age === null) {
    return { valid: false, rejection: reject(DecisionErrorCode.INVALID_PERSONAL_CODE) };
  }
  if (age < constants.minimumAge || age > constants.maximumAge) {
    return { valid: false, rejection: reject(DecisionErrorCode.INVALID_AGE) };
  }

  if (
    !Number.isInteger(loanAmount) ||
    loanAmount < constants.minimumLoanAmount ||
    loanAmount > constants.maximumLoanAmount
  ) {
    return { valid: false, rejection: reject(DecisionErrorCode.INVALID_LOAN_AMOUNT) };
  }

  if (
    !Number.isInteger(loanPeriod) ||
    loanPeriod < constants.minimumLoanPeriod ||
    loanPeriod > constants.maximumLoanPeriod
  ) {
    return { valid: false, rejection: reject(DecisionErrorCode.INVALID_LOAN_PERIOD) };
  }

  return { valid: true };
}
