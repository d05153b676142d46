/**
 * 測試：personalCode — 身分證號驗證、出生日期、年齡
 */

import {
  calculateAge,
  calculateChecksum,
  extractBirthDate,
  getAge,
  isValidPersonalCode,
} from '../utils/personalCode';

const NOW = new Date(2024, 5, 15); // 2024-06-15

// ─── 檢查碼 ─────────────────────────────────────────────────────

describe('calculateChecksum', () => {
  test('第一組權重餘數 < 10 → 直接使用', () => {
    // 3·1+9·2+0·3+1·4+0·5+1·6+0·7+2·8+5·9+0·1 = 92 → 92 % 11 = 4
    expect(calculateChecksum('39010102504')).toBe(4);
  });

  test('第一組餘數 10 → 改用第二組權重', () => {
    // 第一組 32 % 11 = 10；第二組 3·3+9·4+0·5+1·6+0·7+1·8+0·9+0·1+0·2+1·3 = 62 → 62 % 11 = 7
    expect(calculateChecksum('39010100017')).toBe(7);
    expect(isValidPersonalCode('39010100017')).toBe(true);
  });
});

// ─── 格式驗證 ───────────────────────────────────────────────────

describe('isValidPersonalCode', () => {
  test.each(['39010101235', '39010102504', '39010105005', '39010107500', '50606155002'])(
    '%s → 合法',
    (code) => {
      expect(isValidPersonalCode(code)).toBe(true);
    },
  );

  test('檢查碼錯誤 → 不合法', () => {
    expect(isValidPersonalCode('39010102505')).toBe(false);
  });

  test('長度不足 → 不合法', () => {
    expect(isValidPersonalCode('3901010250')).toBe(false);
  });

  test('含非數字 → 不合法', () => {
    expect(isValidPersonalCode('3901010250A')).toBe(false);
  });

  test('世紀碼 7 → 不合法', () => {
    expect(isValidPersonalCode('79010102504')).toBe(false);
  });

  test('不存在的日期（2 月 30 日）即使檢查碼正確 → 不合法', () => {
    expect(calculateChecksum('39002305001')).toBe(1);
    expect(isValidPersonalCode('39002305001')).toBe(false);
  });

  test('空字串 → 不合法', () => {
    expect(isValidPersonalCode('')).toBe(false);
  });
});

// ─── 出生日期 ───────────────────────────────────────────────────

describe('extractBirthDate', () => {
  test('世紀碼 3 → 1900 年代', () => {
    expect(extractBirthDate('39010102504')).toEqual({ year: 1990, month: 10, day: 10 });
  });

  test('世紀碼 5 → 2000 年代', () => {
    expect(extractBirthDate('50606155002')).toEqual({ year: 2006, month: 6, day: 15 });
  });

  test('世紀碼 1 → 2000 年代', () => {
    expect(extractBirthDate('10501015002')).toEqual({ year: 2005, month: 1, day: 1 });
  });

  test('世紀碼 2 → 2000 年代', () => {
    expect(extractBirthDate('20501015003')).toEqual({ year: 2005, month: 1, day: 1 });
  });

  test('月份 13 → null', () => {
    expect(extractBirthDate('39013102504')).toBeNull();
  });

  test('格式錯誤 → null（不拋錯）', () => {
    expect(extractBirthDate('abc')).toBeNull();
  });
});

// ─── 年齡 ───────────────────────────────────────────────────────

describe('calculateAge', () => {
  test('生日當天 → 滿歲', () => {
    expect(calculateAge({ year: 2006, month: 6, day: 15 }, NOW)).toBe(18);
  });

  test('生日前一天 → 未滿', () => {
    expect(calculateAge({ year: 2006, month: 6, day: 16 }, NOW)).toBe(17);
  });

  test('生日月份已過 → 滿歲', () => {
    expect(calculateAge({ year: 1990, month: 1, day: 31 }, NOW)).toBe(34);
  });

  test('生日月份未到 → 未滿', () => {
    expect(calculateAge({ year: 1990, month: 10, day: 10 }, NOW)).toBe(33);
  });
});

describe('getAge', () => {
  test('由身分證號計算年齡', () => {
    expect(getAge('34406155002', NOW)).toBe(80);
    expect(getAge('34306155008', NOW)).toBe(81);
    expect(getAge('50606165009', NOW)).toBe(17);
  });

  test('世紀碼 1 → 依 2000 年代計算年齡', () => {
    expect(getAge('10501015002', NOW)).toBe(19);
  });

  test('無法解析 → null', () => {
    expect(getAge('39002305001', NOW)).toBeNull();
  });
});
