// Parameter identifiers and command variants for live OBD-II data

/**
 * Command code of one queryable vehicle parameter, e.g. `010C` (engine RPM),
 * `221940` (GM Mode 22 DID) or `03` (stored trouble codes).
 */
export type ParameterId = string;

export type ParameterCommand =
  | { kind: 'mode1'; pid: string }
  | { kind: 'gmMode22'; did: string }
  | { kind: 'mode3'; request: 'GET_DTC' }
  | { kind: 'unrecognized'; raw: string };

const MODE1_PATTERN = /^01([0-9A-F]{2})$/;
const GM_MODE22_PATTERN = /^22([0-9A-F]{4})$/;
const MODE3_ID = '03';

export function normalizeParameterId(id: string): ParameterId {
  return id.replace(/\s+/g, '').toUpperCase();
}

export function parseParameterId(id: ParameterId): ParameterCommand {
  const normalized = normalizeParameterId(id);

  const mode1 = MODE1_PATTERN.exec(normalized);
  if (mode1) {
    return { kind: 'mode1', pid: mode1[1] };
  }

  const gm = GM_MODE22_PATTERN.exec(normalized);
  if (gm) {
    return { kind: 'gmMode22', did: gm[1] };
  }

  if (normalized === MODE3_ID) {
    return { kind: 'mode3', request: 'GET_DTC' };
  }

  return { kind: 'unrecognized', raw: id };
}

export function isRecognizedParameter(id: ParameterId): boolean {
  return parseParameterId(id).kind !== 'unrecognized';
}

// Short label used in log lines
export function describeParameter(id: ParameterId): string {
  const command = parseParameterId(id);
  switch (command.kind) {
    case 'mode1':
      return `Mode01 ${command.pid}`;
    case 'gmMode22':
      return `GM Mode22 ${command.did}`;
    case 'mode3':
      return 'Mode03 DTCs';
    case 'unrecognized':
      return `Unknown ${command.raw}`;
  }
}

export function describeParameterSet(ids: Iterable<ParameterId>): string {
  return [...ids].map(describeParameter).sort().join(', ');
}
