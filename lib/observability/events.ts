import { trackEvent } from './log';

export type TrackRoundRecordedPayload = {
  matchId: string;
  roundIndex: number;
  landlord: number;
  stake: number;
  landlordResult: boolean;
};

export type TrackMatchFinalizedPayload = {
  matchId: string;
  totalGames: number;
  discarded: boolean;
};

export const trackRoundRecorded = (payload: TrackRoundRecordedPayload) => {
  trackEvent('round.recorded', {
    match_id: payload.matchId,
    round_index: payload.roundIndex,
    landlord: payload.landlord,
    stake: payload.stake,
    landlord_won: payload.landlordResult,
  });
};

export const trackRoundEdited = (matchId: string, roundIndex: number) => {
  trackEvent('round.edited', { match_id: matchId, round_index: roundIndex });
};

export const trackMatchFinalized = (payload: TrackMatchFinalizedPayload) => {
  trackEvent('match.finalized', {
    match_id: payload.matchId,
    total_games: payload.totalGames,
    discarded: payload.discarded,
  });
};
