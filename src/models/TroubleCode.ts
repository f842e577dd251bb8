// Diagnostic Trouble Code (DTC) model

export type DtcSeverity = 'critical' | 'warning' | 'info';
export type DtcCategory = 'powertrain' | 'chassis' | 'body' | 'network';

export interface TroubleCode {
  code: string;
  severity: DtcSeverity;
  category: DtcCategory;
}

const CATEGORY_BY_PREFIX: Record<string, DtcCategory> = {
  P: 'powertrain',
  C: 'chassis',
  B: 'body',
  U: 'network',
};

export function categoryOf(code: string): DtcCategory {
  return CATEGORY_BY_PREFIX[code.charAt(0).toUpperCase()] ?? 'powertrain';
}

export function troubleCodesEqual(a: readonly TroubleCode[] | null, b: readonly TroubleCode[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((code, i) => code.code === b[i].code);
}
