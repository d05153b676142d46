/**
 * 測試：decisionEngineConstants — 預設值與環境變數覆寫
 */

import {
  DEFAULT_DECISION_ENGINE_CONSTANTS,
  loadDecisionEngineConstants,
} from '../config/decisionEngineConstants';

describe('loadDecisionEngineConstants', () => {
  test('無環境變數 → 預設值', () => {
    expect(loadDecisionEngineConstants({})).toEqual(DEFAULT_DECISION_ENGINE_CONSTANTS);
  });

  test('預設值', () => {
    expect(DEFAULT_DECISION_ENGINE_CONSTANTS).toEqual({
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
  });

  test('環境變數覆寫對應欄位', () => {
    const constants = loadDecisionEngineConstants({
      LOAN_MAX_PERIOD: '48',
      LOAN_SEGMENT_3_MODIFIER: '800',
      LOAN_AMOUNT_STEP: ' 50 ',
    });
    expect(constants.maximumLoanPeriod).toBe(48);
    expect(constants.segment3CreditModifier).toBe(800);
    expect(constants.loanAmountStep).toBe(50);
    expect(constants.minimumLoanPeriod).toBe(12);
  });

  test.each(['abc', '-5', '0', '12.5', ''])('不合法值 %p → 使用預設值', (raw) => {
    expect(loadDecisionEngineConstants({ LOAN_AMOUNT_STEP: raw }).loanAmountStep).toBe(100);
  });

  test('下限大於上限 → 拋錯', () => {
    expect(() => loadDecisionEngineConstants({ LOAN_MIN_AMOUNT: '20000' })).toThrow(
      'LOAN_MIN_AMOUNT',
    );
  });

  test('不修改預設常數', () => {
    loadDecisionEngineConstants({ LOAN_MIN_AGE: '21' });
    expect(DEFAULT_DECISION_ENGINE_CONSTANTS.minimumAge).toBe(18);
  });
});
