/**
 * INPUT: enums.ts（CreditSegment、DecisionErrorCode）
 * OUTPUT: 貸款決策引擎所有類型定義（LoanRequest, Decision, DecisionResponse, 常數）
 * POS: 資料模型層，定義決策引擎與 API 層共用 TypeScript 介面
 */

import { DecisionErrorCode } from './enums';

// ─────────────────────────────────────────────────────────────────
// 請求介面
// ─────────────────────────────────────────────────────────────────

/** 貸款申請 */
export interface LoanRequest {
  /** 愛沙尼亞身分證號（11 碼） */
  personalCode: string;
  /** 申請金額（歐元） */
  loanAmount: number;
  /** 申請期數（月） */
  loanPeriod: number;
}

// ─────────────────────────────────────────────────────────────────
// 設定
// ─────────────────────────────────────────────────────────────────

/** 決策引擎常數 */
export interface DecisionEngineConstants {
  minimumLoanAmount: number;
  maximumLoanAmount: number;
  minimumLoanPeriod: number;
  maximumLoanPeriod: number;
  segment1CreditModifier: number;
  segment2CreditModifier: number;
  segment3CreditModifier: number;
  /** 最高可貸金額搜尋的步進（歐元） */
  loanAmountStep: number;
  minimumAge: number;
  maximumAge: number;
}

/** 單次決策的執行環境，每次呼叫各自獨立 */
export interface DecisionContext {
  constants: DecisionEngineConstants;
  /** 申請當下日期，用於計算年齡 */
  now: Date;
}

// ─────────────────────────────────────────────────────────────────
// 結果介面
// ─────────────────────────────────────────────────────────────────

/** 核貸 */
export interface ApprovedDecision {
  approved: true;
  loanAmount: number;
  loanPeriod: number;
}

/** 否決 */
export interface RejectedDecision {
  approved: false;
  errorCode: DecisionErrorCode;
  errorMessage: string;
}

/** 決策結果：核貸（金額 + 期數）與否決原因二擇一 */
export type Decision = ApprovedDecision | RejectedDecision;

/** API 回應格式（前端沿用 null 欄位） */
export interface DecisionResponse {
  loanAmount: number | null;
  loanPeriod: number | null;
  errorMessage: string | null;
}
