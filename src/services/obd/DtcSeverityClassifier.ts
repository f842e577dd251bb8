// Classifies trouble codes reported by the scan or the Mode 03 stream

import { DtcSeverity, TroubleCode, categoryOf } from '../../models/TroubleCode';

const CRITICAL_PATTERNS: RegExp[] = [
  /^P030[0-9]/, // misfires
  /^P031[0-9]/, // ignition coil
  /^P070[0-9]/, // transmission control system
  /^P073[0-9]/, // gear ratio
  /^P020[1-8]/, // injector circuits
  /^P0335/, // crankshaft position sensor
  /^P0340/, // camshaft position sensor
  /^C00(35|40|45|50)/, // wheel speed sensors
  /^B000[1-9]/, // airbag circuits
  /^U010[01]/, // lost communication with ECM/TCM
];

const WARNING_PATTERNS: RegExp[] = [
  /^P01[0-7][0-9]/, // MAF/IAT/TPS, O2 sensors, fuel trim
  /^P04[2-5][0-9]/, // catalyst, EVAP
  /^P050[0-9]/, // vehicle speed, idle control
  /^P07[12][0-9]/, // transmission sensors
  /^[CB][0-9]{4}$/,
];

export class DtcSeverityClassifier {
  classifySeverity(code: string): DtcSeverity {
    const upper = code.toUpperCase();

    if (CRITICAL_PATTERNS.some(pattern => pattern.test(upper))) {
      return 'critical';
    }
    if (WARNING_PATTERNS.some(pattern => pattern.test(upper))) {
      return 'warning';
    }
    return 'info';
  }

  classify(codes: readonly string[]): TroubleCode[] {
    const seen = new Set<string>();
    const result: TroubleCode[] = [];
    for (const raw of codes) {
      const code = raw.trim().toUpperCase();
      if (code.length === 0 || seen.has(code)) continue;
      seen.add(code);
      result.push({ code, severity: this.classifySeverity(code), category: categoryOf(code) });
    }
    return result;
  }
}

export const dtcSeverityClassifier = new DtcSeverityClassifier();
