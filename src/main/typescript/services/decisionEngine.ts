/**
 * INPUT: LoanRequest（身分證號、申請金額、申請期數）、DecisionContext（選填）
 * OUTPUT: Decision（核貸金額 + 期數，或否決原因）
 * POS: 服務層，整合輸入檢核、信用分群與最高可貸金額搜尋，產出貸款決策
 */

import { CreditSegment, DecisionErrorCode } from '../models/enums';
import { Decision, DecisionContext, LoanRequest } from '../models/decision';
import { DEFAULT_DECISION_ENGINE_CONSTANTS } from '../config/decisionEngineConstants';
import { verifyInputs } from './decisionEngine/inputValidator';
import { getCreditModifier, getCreditSegment } from './decisionEngine/creditSegment';
import { highestValidLoanAmount } from './decisionEngine/loanAmountSearch';
import { reject } from './decisionEngine/rejection';

/**
 * 計算可核貸的最高金額與期數
 *
 * 流程：檢核輸入 → 判定分群 → 以申請期數搜尋最高可貸金額
 *       → 不足最低金額則逐月延長期數，直到最高期數仍不足即否決
 *
 * 信用係數為區域變數，每次呼叫各自計算，不保留任何跨請求狀態
 */
export function calculateApprovedLoan(
  req: LoanRequest,
  context: Partial<DecisionContext> = {},
): Decision {
  const ctx: DecisionContext = {
    constants: context.constants ?? DEFAULT_DECISION_ENGINE_CONSTANTS,
    now: context.now ?? new Date(),
  };
  const { constants } = ctx;

  const validation = verifyInputs(req, ctx);
  if (!validation.valid) return validation.rejection;

  const segment = getCreditSegment(req.personalCode);
  if (segment === CreditSegment.DEBT) {
    return reject(DecisionErrorCode.NO_VALID_LOAN);
  }
  const creditModifier = getCreditModifier(segment, constants);

  for (
    let loanPeriod = req.loanPeriod;
    loanPeriod <= constants.maximumLoanPeriod;
    loanPeriod++
  ) {
    const highestAmount = highestValidLoanAmount(
      creditModifier,
      loanPeriod,
      req.loanAmount,
      constants.loanAmountStep,
    );
    if (highestAmount >= constants.minimumLoanAmount) {
      return {
        approved: true,
        loanAmount: Math.min(constants.maximumLoanAmount, highestAmount),
        loanPeriod,
      };
    }
  }

  return reject(DecisionErrorCode.NO_VALID_LOAN);
}
