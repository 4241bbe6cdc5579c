export type Information = Readonly<Record<string, unknown>>;

/** Where the session is and what it has collected. Never mutated; every change yields a new value. */
export interface SessionState {
  readonly locationId: string;
  readonly information: Information;
}

export function createState(locationId: string, information: Information = {}): SessionState {
  return Object.freeze({
    locationId,
    information: Object.freeze({ ...information }),
  });
}

/** Merges `newInformation` over the existing entries; later keys win. */
export function updateState(state: SessionState, newInformation: Information): SessionState {
  return createState(state.locationId, { ...state.information, ...newInformation });
}

export function moveTo(state: SessionState, locationId: string): SessionState {
  if (state.locationId === locationId) return state;
  return createState(locationId, state.information);
}
