import { generateColor } from './color';

export type JoinSetKind = 'oneOff' | 'named' | 'generated';

/** Identifies a join set within one execution. */
export interface JoinSetId {
  kind: JoinSetKind;
  name: string;
}

const JOIN_SET_ID_INFIX = ':';

const KIND_CODES: Record<JoinSetKind, string> = {
  oneOff: 'o',
  named: 'n',
  generated: 'g',
};

/**
 * `o:name`, `n:name` or `g:name`. Unique within an execution, so it is also
 * used as the key of per-join-set response lists.
 */
export function formatJoinSetId(joinSetId: JoinSetId): string {
  return `${KIND_CODES[joinSetId.kind]}${JOIN_SET_ID_INFIX}${joinSetId.name}`;
}

export function joinSetIdColor(joinSetId: JoinSetId): string {
  return generateColor(formatJoinSetId(joinSetId));
}
