/**
 * INPUT: DecisionErrorCode
 * OUTPUT: RejectedDecision（代碼 + 前端顯示訊息）
 * POS: 服務層，否決原因與訊息對照
 */

import { DecisionErrorCode } from '../../models/enums';
import { RejectedDecision } from '../../models/decision';

export const DECISION_ERROR_MESSAGES: Record<DecisionErrorCode, string> = {
  [DecisionErrorCode.INVALID_PERSONAL_CODE]: 'Invalid personal ID code!',
  [DecisionErrorCode.INVALID_AGE]: 'You are not approved for a loan due to age.',
  [DecisionErrorCode.INVALID_LOAN_AMOUNT]: 'Invalid loan amount!',
  [DecisionErrorCode.INVALID_LOAN_PERIOD]: 'Invalid loan period!',
  [DecisionErrorCode.NO_VALID_LOAN]: 'You are not approved for a loan.',
};

export function reject(errorCode: DecisionErrorCode): RejectedDecision {
  return { approved: false, errorCode, errorMessage: DECISION_ERROR_MESSAGES[errorCode] };
}
