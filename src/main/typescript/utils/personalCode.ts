/**
 * INPUT: 愛沙尼亞身分證號（isikukood，11 碼 GYYMMDDSSSC）
 * OUTPUT: 格式 / 檢查碼驗證結果、出生日期、申請當下年齡
 * POS: 工具模組，身分證號解析與驗證
 */

/** 出生日期 */
export interface BirthDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const PERSONAL_CODE_PATTERN = /^[1-6]\d{10}$/;

/** 檢查碼第一組 / 第二組權重 */
const CHECKSUM_WEIGHTS_1 = [1, 2, 3, 4, 5, 6, 7, 8, 9, 1];
const CHECKSUM_WEIGHTS_2 = [3, 4, 5, 6, 7, 8, 9, 1, 2, 3];

/**
 * 世紀碼 → 基準年
 * 3/4: 1900 | 其餘（1/2/5/6）: 2000
 */
function centuryBaseYear(centuryDigit: number): number {
  return centuryDigit === 3 || centuryDigit === 4 ? 1900 : 2000;
}

/**
 * 計算檢查碼
 * 前 10 碼乘第一組權重加總 mod 11；餘數 10 改用第二組；仍為 10 → 0
 */
export function calculateChecksum(personalCode: string): number {
  const digits = personalCode.slice(0, 10).split('').map(Number);
  const weighted = (weights: number[]) =>
    digits.reduce((sum, d, i) => sum + d * weights[i], 0) % 11;

  const first = weighted(CHECKSUM_WEIGHTS_1);
  if (first < 10) return first;
  const second = weighted(CHECKSUM_WEIGHTS_2);
  return second < 10 ? second : 0;
}

/** 取出出生日期；格式錯誤或日期不存在（如 2 月 30 日）→ null */
export function extractBirthDate(personalCode: string): BirthDate | null {
  if (!PERSONAL_CODE_PATTERN.test(personalCode)) return null;

  const baseYear = centuryBaseYear(parseInt(personalCode.substring(0, 1), 10));
  const year = baseYear + parseInt(personalCode.substring(1, 3), 10);
  const month = parseInt(personalCode.substring(3, 5), 10);
  const day = parseInt(personalCode.substring(5, 7), 10);

  // Date.UTC 會自動進位（2/30 → 3/2），比對回來確認日期真實存在
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

/** 驗證身分證號：11 碼數字、世紀碼、出生日期、檢查碼 */
export function isValidPersonalCode(personalCode: string): boolean {
  if (extractBirthDate(personalCode) === null) return false;
  return calculateChecksum(personalCode) === parseInt(personalCode.substring(10, 11), 10);
}

/** 計算滿幾歲（生日當天起算） */
export function calculateAge(birthDate: BirthDate, now: Date): number {
  const currentMonth = now.getMonth() + 1;
  const currentDay = now.getDate();

  let age = now.getFullYear() - birthDate.year;
  if (
    currentMonth < birthDate.month ||
    (currentMonth === birthDate.month && currentDay < birthDate.day)
  ) {
    age -= 1;
  }
  return age;
}

/** 由身分證號計算申請當下年齡；無法解析 → null */
export function getAge(personalCode: string, now: Date): number | null {
  const birthDate = extractBirthDate(personalCode);
  if (birthDate === null) return null;
  return calculateAge(birthDate, now);
}
