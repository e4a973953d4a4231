import { invalidModifier } from './errors';
import { MAX_BOMBS, mapTriple, type RoundOutcome, type ScoreTriple, type Seat, type Triple } from './types';

export type RoundModifiers = Readonly<{
  landlordSeat: Seat;
  bombs: number;
  spring: boolean;
  doubled: Triple<boolean>;
  landlordResult: boolean;
}>;

export type StakeBreakdown = Readonly<{
  /** stake after bombs, spring and the landlord's double */
  stake: number;
  /** what each seat pays or collects, unsigned; the landlord's entry is the farmers' sum */
  payments: ScoreTriple;
  deltas: ScoreTriple;
}>;

export function assertValidModifiers(baseStake: number, modifiers: RoundModifiers): void {
  if (!Number.isInteger(baseStake) || baseStake <= 0) {
    throw invalidModifier('baseStake', baseStake);
  }
  if (!Number.isInteger(modifiers.bombs) || modifiers.bombs < 0 || modifiers.bombs > MAX_BOMBS) {
    throw invalidModifier('bombs', modifiers.bombs);
  }
  if (modifiers.landlordSeat !== 0 && modifiers.landlordSeat !== 1 && modifiers.landlordSeat !== 2) {
    throw invalidModifier('landlordSeat', modifiers.landlordSeat);
  }
}

/**
 * Signed point deltas for one round. Order matters: bombs, then spring, then the
 * landlord's double, and only then each farmer's own double on their payment.
 */
export function applyMultipliers(baseStake: number, modifiers: RoundModifiers): StakeBreakdown {
  assertValidModifiers(baseStake, modifiers);
  const { landlordSeat, doubled } = modifiers;

  let stake = baseStake * 2 ** modifiers.bombs;
  if (modifiers.spring) stake *= 2;
  if (doubled[landlordSeat]) stake *= 2;

  const farmerPayments = mapTriple(doubled, (isDoubled, seat) =>
    seat === landlordSeat ? 0 : isDoubled ? stake * 2 : stake,
  );
  const landlordTotal = farmerPayments[0] + farmerPayments[1] + farmerPayments[2];
  const payments = mapTriple(farmerPayments, (payment, seat) =>
    seat === landlordSeat ? landlordTotal : payment,
  );

  const landlordSign = modifiers.landlordResult ? 1 : -1;
  const deltas = mapTriple(payments, (payment, seat) =>
    seat === landlordSeat ? landlordSign * payment : -landlordSign * payment,
  );

  return Object.freeze({ stake, payments, deltas });
}

export function outcomeOf(delta: number): RoundOutcome {
  if (delta > 0) return 'win';
  if (delta < 0) return 'loss';
  return 'neutral';
}
