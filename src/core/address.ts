/**
 * Address Model
 *
 * Identity and validity rules for module and group addresses, plus the
 * mapping between physical segment ids (as seen on the wire) and logical
 * ones (as used by callers).
 */

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Immutable bus address. Segment 0 means "the local segment" until the
 * connection has resolved the real id.
 */
export interface Address {
  readonly segmentId: number;
  readonly entityId: number;
  readonly isGroup: boolean;
}

export const MAX_SEGMENT_ID = 128;
export const MIN_MODULE_ID = 1;
export const MIN_GROUP_ID = 3;
export const MAX_ENTITY_ID = 253;

/** Segment id meaning "local segment not known yet". */
export const UNKNOWN_SEGMENT_ID = -1;

// -----------------------------------------------------------------------------
// Construction
// -----------------------------------------------------------------------------

export function createAddress(segmentId: number, entityId: number, isGroup = false): Address {
  return Object.freeze({ segmentId, entityId, isGroup });
}

export function moduleAddress(segmentId: number, moduleId: number): Address {
  return createAddress(segmentId, moduleId, false);
}

export function groupAddress(segmentId: number, groupId: number): Address {
  return createAddress(segmentId, groupId, true);
}

// -----------------------------------------------------------------------------
// Validity & Equality
// -----------------------------------------------------------------------------

/**
 * Check the id ranges. Out-of-range addresses can be constructed, but must
 * not be used to emit commands.
 */
export function isValidAddress(addr: Address): boolean {
  if (!Number.isInteger(addr.segmentId) || !Number.isInteger(addr.entityId)) {
    return false;
  }
  if (addr.segmentId < 0 || addr.segmentId > MAX_SEGMENT_ID) {
    return false;
  }
  const minId = addr.isGroup ? MIN_GROUP_ID : MIN_MODULE_ID;
  return addr.entityId >= minId && addr.entityId <= MAX_ENTITY_ID;
}

export function addressEquals(a: Address, b: Address): boolean {
  return a.segmentId === b.segmentId && a.entityId === b.entityId && a.isGroup === b.isGroup;
}

/**
 * Stable string key, used for maps keyed by address.
 */
export function addressKey(addr: Address): string {
  return `${addr.isGroup ? 'G' : 'M'}${addr.segmentId}:${addr.entityId}`;
}

export function formatAddress(addr: Address): string {
  const seg = String(addr.segmentId).padStart(3, '0');
  const id = String(addr.entityId).padStart(3, '0');
  return `(${addr.isGroup ? 'G' : 'M'}${seg}${id})`;
}

// -----------------------------------------------------------------------------
// Physical <-> Logical
// -----------------------------------------------------------------------------

/**
 * Replace segment 0 with the resolved local segment id. Returns the same
 * object when nothing changes.
 */
export function physicalToLogical(addr: Address, localSegmentId: number): Address {
  if (addr.segmentId !== 0 || localSegmentId === UNKNOWN_SEGMENT_ID) {
    return addr;
  }
  return createAddress(localSegmentId, addr.entityId, addr.isGroup);
}

/**
 * Segment id to put on the wire: 0 when the address lives on the local
 * segment, otherwise the real id.
 */
export function getPhysicalSegmentId(addr: Address, localSegmentId: number): number {
  return addr.segmentId === localSegmentId ? 0 : addr.segmentId;
}
