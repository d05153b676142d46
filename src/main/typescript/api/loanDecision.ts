/**
 * INPUT: POST /api/loan/decision（{ personalCode, loanAmount, loanPeriod } JSON）
 * OUTPUT: DecisionResponse（loanAmount / loanPeriod / errorMessage）
 * POS: API 層，路由 + 欄位型別驗證，呼叫 decisionEngine 產出貸款決策
 */

import { Router, Request, Response } from 'express';
import { DecisionErrorCode } from '../models/enums';
import { Decision, DecisionResponse, LoanRequest } from '../models/decision';
import { loadDecisionEngineConstants } from '../config/decisionEngineConstants';
import { calculateApprovedLoan } from '../services/decisionEngine';

export const loanDecisionRouter = Router();

const constants = loadDecisionEngineConstants();

/** 否決原因 → HTTP 狀態碼 */
const ERROR_STATUS: Record<DecisionErrorCode, number> = {
  [DecisionErrorCode.INVALID_PERSONAL_CODE]: 400,
  [DecisionErrorCode.INVALID_AGE]: 400,
  [DecisionErrorCode.INVALID_LOAN_AMOUNT]: 400,
  [DecisionErrorCode.INVALID_LOAN_PERIOD]: 400,
  [DecisionErrorCode.NO_VALID_LOAN]: 404,
};

// ─── 欄位驗證輔助 ──────────────────────────────────────────────

function validateRequest(body: unknown): { valid: true; req: LoanRequest } | { valid: false; error: string } {
  if (!body || typeof body !== 'object') {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const b = body as Record<string, unknown>;
  const { personalCode, loanAmount, loanPeriod } = b;

  if (typeof personalCode !== 'string' || !personalCode) {
    return { valid: false, error: 'personalCode must be a non-empty string' };
  }
  if (typeof loanAmount !== 'number') {
    return { valid: false, error: 'loanAmount must be a number' };
  }
  if (typeof loanPeriod !== 'number') {
    return { valid: false, error: 'loanPeriod must be a number' };
  }

  return { valid: true, req: { personalCode: personalCode.trim(), loanAmount, loanPeriod } };
}

function toResponse(decision: Decision): DecisionResponse {
  if (decision.approved) {
    return { loanAmount: decision.loanAmount, loanPeriod: decision.loanPeriod, errorMessage: null };
  }
  return { loanAmount: null, loanPeriod: null, errorMessage: decision.errorMessage };
}

function errorResponse(errorMessage: string): DecisionResponse {
  return { loanAmount: null, loanPeriod: null, errorMessage };
}

// ─── POST /api/loan/decision ──────────────────────────────────

loanDecisionRouter.post('/loan/decision', (req: Request, res: Response): void => {
  const validation = validateRequest(req.body);
  if (!validation.valid) {
    res.status(400).json(errorResponse(validation.error));
    return;
  }

  try {
    const decision = calculateApprovedLoan(validation.req, { constants });
    const status = decision.approved ? 200 : ERROR_STATUS[decision.errorCode];
    res.status(status).json(toResponse(decision));
  } catch (err) {
    console.error('[loanDecision] 決策執行錯誤:', err);
    res.status(500).json(errorResponse('An unexpected error occurred'));
  }
});
