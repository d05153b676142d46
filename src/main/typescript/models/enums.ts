/**
 * INPUT: 無
 * OUTPUT: 信用分群、決策錯誤代碼等列舉定義
 * POS: 資料模型層，定義貸款決策引擎共用的列舉常數
 */

/** 信用分群（依身分證號末四碼） */
export enum CreditSegment {
  /** 債務戶 0000-2499，一律不核貸 */
  DEBT = 'DEBT',
  /** 第一分群 2500-4999 */
  SEGMENT_1 = 'SEGMENT_1',
  /** 第二分群 5000-7499 */
  SEGMENT_2 = 'SEGMENT_2',
  /** 第三分群 7500-9999 */
  SEGMENT_3 = 'SEGMENT_3',
}

/** 否決原因代碼 */
export enum DecisionErrorCode {
  /** 身分證號格式或檢查碼錯誤 */
  INVALID_PERSONAL_CODE = 'INVALID_PERSONAL_CODE',
  /** 年齡不在 18-80 歲 */
  INVALID_AGE = 'INVALID_AGE',
  /** 申請金額超出上下限 */
  INVALID_LOAN_AMOUNT = 'INVALID_LOAN_AMOUNT',
  /** 申請期數超出上下限 */
  INVALID_LOAN_PERIOD = 'INVALID_LOAN_PERIOD',
  /** 任何期數皆無可核貸金額 */
  NO_VALID_LOAN = 'NO_VALID_LOAN',
}
