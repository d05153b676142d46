/**
 * INPUT: 環境變數（LOAN_*，選填）
 * OUTPUT: DEFAULT_DECISION_ENGINE_CONSTANTS、loadDecisionEngineConstants()
 * POS: 設定層，定義決策引擎金額 / 期數 / 年齡上下限與各分群信用係數
 */

import { DecisionEngineConstants } from '../models/decision';

export const DEFAULT_DECISION_ENGINE_CONSTANTS: Readonly<DecisionEngineConstants> = Object.freeze({
  minimumLoanAmount: 2_000,
  maximumLoanAmount: 10_000,
  minimumLoanPeriod: 12,
  maximumLoanPeriod: 60,
  segment1CreditModifier: 100,
  segment2CreditModifier: 300,
  segment3CreditModifier: 1_000,
  loanAmountStep: 100,
  minimumAge: 18,
  maximumAge: 80,
});

/** 常數欄位 ↔ 環境變數名稱 */
const ENV_KEYS: Record<keyof DecisionEngineConstants, string> = {
  minimumLoanAmount: 'LOAN_MIN_AMOUNT',
  maximumLoanAmount: 'LOAN_MAX_AMOUNT',
  minimumLoanPeriod: 'LOAN_MIN_PERIOD',
  maximumLoanPeriod: 'LOAN_MAX_PERIOD',
  segment1CreditModifier: 'LOAN_SEGMENT_1_MODIFIER',
  segment2CreditModifier: 'LOAN_SEGMENT_2_MODIFIER',
  segment3CreditModifier: 'LOAN_SEGMENT_3_MODIFIER',
  loanAmountStep: 'LOAN_AMOUNT_STEP',
  minimumAge: 'LOAN_MIN_AGE',
  maximumAge: 'LOAN_MAX_AGE',
};

/** 解析正整數，不合法時回傳 null */
function parsePositiveInt(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return null;
  const n = parseInt(raw.trim(), 10);
  return n > 0 ? n : null;
}

/**
 * 讀取環境變數覆寫預設常數
 * 缺漏或非正整數 → 使用預設值；上下限顛倒 → 啟動時直接拋錯
 */
export function loadDecisionEngineConstants(
  env: NodeJS.ProcessEnv = process.env,
): DecisionEngineConstants {
  const constants: DecisionEngineConstants = { ...DEFAULT_DECISION_ENGINE_CONSTANTS };

  for (const key of Object.keys(ENV_KEYS) as (keyof DecisionEngineConstants)[]) {
    const value = parsePositiveInt(env[ENV_KEYS[key]]);
    if (value !== null) constants[key] = value;
  }

  const ranges: [keyof DecisionEngineConstants, keyof DecisionEngineConstants][] = [
    ['minimumLoanAmount', 'maximumLoanAmount'],
    ['minimumLoanPeriod', 'maximumLoanPeriod'],
    ['minimumAge', 'maximumAge'],
  ];
  for (const [min, max] of ranges) {
    if (constants[min] > constants[max]) {
      throw new Error(
        `決策引擎設定錯誤：${ENV_KEYS[min]}（${constants[min]}）大於 ${ENV_KEYS[max]}（${constants[max]}）`,
      );
    }
  }

  return constants;
}
