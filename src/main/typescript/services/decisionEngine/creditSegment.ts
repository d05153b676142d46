/**
 * INPUT: 身分證號、DecisionEngineConstants
 * OUTPUT: CreditSegment、信用係數（creditModifier）
 * POS: 服務層，依身分證號末四碼判定信用分群
 */

import { CreditSegment } from '../../models/enums';
import { DecisionEngineConstants } from '../../models/decision';

/**
 * 末四碼分群
 * 0000-2499: 債務戶 | 2500-4999: 分群 1 | 5000-7499: 分群 2 | 7500-9999: 分群 3
 */
export function getCreditSegment(personalCode: string): CreditSegment {
  const segment = parseInt(personalCode.substring(personalCode.length - 4), 10);

  if (segment < 2500) return CreditSegment.DEBT;
  if (segment < 5000) return CreditSegment.SEGMENT_1;
  if (segment < 7500) return CreditSegment.SEGMENT_2;
  return CreditSegment.SEGMENT_3;
}

/** 分群 → 信用係數；債務戶為 0 */
export function getCreditModifier(
  segment: CreditSegment,
  constants: DecisionEngineConstants,
): number {
  switch (segment) {
    case CreditSegment.DEBT:
      return 0;
    case CreditSegment.SEGMENT_1:
      return constants.segment1CreditModifier;
    case CreditSegment.SEGMENT_2:
      return constants.segment2CreditModifier;
    case CreditSegment.SEGMENT_3:
      return constants.segment3CreditModifier;
  }
}
