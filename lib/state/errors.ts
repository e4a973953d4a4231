export type StateError<I> = Error & { info: I };

export type InvalidModifierInfo = {
  code: 'modifier.invalid';
  field: string;
  value: unknown;
};

export type InvalidEventInfo = {
  code: 'event.invalid_shape' | 'event.unknown_type' | 'event.invalid_payload';
  details?: unknown;
};

export function createStateError<I>(name: string, info: I): StateError<I> {
  return Object.assign(new Error(name), { name, info });
}

export function isStateError(error: unknown, name?: string): error is StateError<unknown> {
  if (!(error instanceof Error) || !('info' in error)) return false;
  return name === undefined || error.name === name;
}

export function invalidModifier(field: string, value: unknown): StateError<InvalidModifierInfo> {
  return createStateError('InvalidModifier', { code: 'modifier.invalid', field, value });
}

export type RecordNotFoundInfo = {
  code: 'store.not_found';
  kind: 'round' | 'match';
  id: string;
};

export function recordNotFound(
  kind: RecordNotFoundInfo['kind'],
  id: string,
): StateError<RecordNotFoundInfo> {
  return createStateError('RecordNotFound', { code: 'store.not_found', kind, id });
}
