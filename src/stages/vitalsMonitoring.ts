import { DEFAULT_VITALS_THRESHOLDS, type VitalsThresholds } from "../config.js";
import { severityRank, type Severity } from "../schema/clinical.js";
import { success, type StageOutcome } from "../schema/outcome.js";
import {
  VITAL_KEYS,
  type AlertCode,
  type TrendDirection,
  type VitalKey,
  type VitalTrend,
  type VitalsAlert,
  type VitalsAssessment,
  type VitalsSnapshot,
  type VitalsStatus,
} from "../schema/vitals.js";
import type { StageContract, VitalsView } from "./types.js";

function alert(
  code: AlertCode,
  vital: VitalKey,
  value: number,
  severity: Severity,
  message: string,
  actionRequired: string,
): VitalsAlert {
  return { code, vital, value, severity, message, actionRequired };
}

/**
 * Classifies every measured vital against the thresholds. Alerts are
 * returned in classification order: heart rate, blood pressure, oxygen
 * saturation, temperature, respiratory rate.
 */
export function classifyVitals(snapshot: VitalsSnapshot, thresholds: VitalsThresholds): VitalsAlert[] {
  const alerts: VitalsAlert[] = [];
  const { heartRate, systolic, diastolic, oxygenSaturation, temperature, respiratoryRate } = snapshot;

  if (heartRate !== undefined) {
    const hr = thresholds.heartRate;
    if (heartRate > hr.high) {
      const critical = heartRate > hr.criticalHigh;
      alerts.push(
        alert(
          "tachycardia",
          "heartRate",
          heartRate,
          critical ? "critical" : "medium",
          `Tachycardia: heart rate ${heartRate} bpm`,
          critical ? "Immediate medical evaluation required" : "Reassess at rest and review medications",
        ),
      );
    } else if (heartRate < hr.low) {
      const critical = heartRate < hr.criticalLow;
      alerts.push(
        alert(
          "bradycardia",
          "heartRate",
          heartRate,
          critical ? "critical" : "medium",
          `Bradycardia: heart rate ${heartRate} bpm`,
          critical ? "Immediate medical evaluation required" : "Reassess and review rate-limiting medications",
        ),
      );
    }
  }

  const bp = thresholds.bloodPressure;
  const systolicCrisis = systolic !== undefined && systolic >= bp.systolicCrisis;
  const diastolicCrisis = diastolic !== undefined && diastolic >= bp.diastolicCrisis;
  if (systolicCrisis || diastolicCrisis) {
    const vital: VitalKey = systolicCrisis ? "systolic" : "diastolic";
    alerts.push(
      alert(
        "hypertensive_crisis",
        vital,
        (systolicCrisis ? systolic : diastolic) ?? 0,
        "critical",
        `Hypertensive crisis: blood pressure ${systolic ?? "?"}/${diastolic ?? "?"} mmHg`,
        "Immediate medical intervention required",
      ),
    );
  } else {
    const systolicHigh = systolic !== undefined && systolic >= bp.systolicHigh;
    const diastolicHigh = diastolic !== undefined && diastolic >= bp.diastolicHigh;
    if (systolicHigh || diastolicHigh) {
      alerts.push(
        alert(
          "hypertension",
          systolicHigh ? "systolic" : "diastolic",
          (systolicHigh ? systolic : diastolic) ?? 0,
          "medium",
          `Hypertension: blood pressure ${systolic ?? "?"}/${diastolic ?? "?"} mmHg`,
          "Repeat measurement and review antihypertensive therapy",
        ),
      );
    }
  }
  if (systolic !== undefined && systolic < bp.systolicLow) {
    alerts.push(
      alert(
        "hypotension",
        "systolic",
        systolic,
        "high",
        `Hypotension: systolic pressure ${systolic} mmHg`,
        "Immediate medical evaluation required",
      ),
    );
  }

  if (oxygenSaturation !== undefined && oxygenSaturation < thresholds.oxygenSaturation.low) {
    const critical = oxygenSaturation < thresholds.oxygenSaturation.criticalLow;
    alerts.push(
      alert(
        "hypoxemia",
        "oxygenSaturation",
        oxygenSaturation,
        critical ? "critical" : "high",
        `Hypoxemia: oxygen saturation ${oxygenSaturation}%`,
        "Oxygen therapy and immediate evaluation",
      ),
    );
  }

  if (temperature !== undefined) {
    const temp = thresholds.temperature;
    if (temperature > temp.hyperpyrexia) {
      alerts.push(
        alert(
          "hyperpyrexia",
          "temperature",
          temperature,
          "critical",
          `High fever: temperature ${temperature}°C`,
          "Antipyretic treatment and evaluation",
        ),
      );
    } else if (temperature >= temp.fever) {
      alerts.push(
        alert("fever", "temperature", temperature, "low", `Fever: temperature ${temperature}°C`, "Monitor temperature"),
      );
    } else if (temperature < temp.hypothermia) {
      alerts.push(
        alert(
          "hypothermia",
          "temperature",
          temperature,
          "high",
          `Hypothermia: temperature ${temperature}°C`,
          "Warming measures required",
        ),
      );
    }
  }

  if (respiratoryRate !== undefined) {
    const rr = thresholds.respiratoryRate;
    if (respiratoryRate > rr.high) {
      const critical = respiratoryRate > rr.criticalHigh;
      alerts.push(
        alert(
          "tachypnea",
          "respiratoryRate",
          respiratoryRate,
          critical ? "critical" : "medium",
          `Tachypnea: respiratory rate ${respiratoryRate}/min`,
          critical ? "Immediate respiratory assessment required" : "Assess work of breathing",
        ),
      );
    } else if (respiratoryRate < rr.low) {
      alerts.push(
        alert(
          "bradypnea",
          "respiratoryRate",
          respiratoryRate,
          "medium",
          `Bradypnea: respiratory rate ${respiratoryRate}/min`,
          "Assess sedation and respiratory drive",
        ),
      );
    }
  }

  return alerts;
}

/** Severity descending; equal severities keep classification order. */
export function rankAlerts(alerts: VitalsAlert[]): VitalsAlert[] {
  return alerts
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => severityRank(b.entry.severity) - severityRank(a.entry.severity) || a.index - b.index)
    .map(({ entry }) => entry);
}

function previousSnapshot(snapshot: VitalsSnapshot, prior: readonly VitalsSnapshot[]): VitalsSnapshot | undefined {
  const current = Date.parse(snapshot.timestamp);
  let latest: VitalsSnapshot | undefined;
  for (const candidate of prior) {
    const at = Date.parse(candidate.timestamp);
    if (candidate.patientId !== snapshot.patientId || !(at < current)) {
      continue;
    }
    if (!latest || at > Date.parse(latest.timestamp)) {
      latest = candidate;
    }
  }
  return latest;
}

export function computeTrends(current: VitalsSnapshot, previous: VitalsSnapshot): VitalTrend[] {
  const trends: VitalTrend[] = [];
  for (const vital of VITAL_KEYS) {
    const now = current[vital];
    const before = previous[vital];
    if (now === undefined || before === undefined) {
      continue;
    }
    const change = Math.round((now - before) * 100) / 100;
    const direction: TrendDirection = change > 0 ? "rising" : change < 0 ? "falling" : "stable";
    trends.push({ vital, direction, change, previous: before, current: now });
  }
  return trends;
}

/** Pure classification of one snapshot, with trends against the immediately preceding one. */
export function assessVitals(
  snapshot: VitalsSnapshot,
  prior: readonly VitalsSnapshot[] = [],
  thresholds: VitalsThresholds = DEFAULT_VITALS_THRESHOLDS,
): VitalsAssessment {
  const alerts = rankAlerts(classifyVitals(snapshot, thresholds));
  const status: VitalsStatus = alerts.some((entry) => entry.severity === "critical")
    ? "critical"
    : alerts.length > 0
      ? "abnormal"
      : "normal";

  const assessment: VitalsAssessment = {
    patientId: snapshot.patientId,
    timestamp: snapshot.timestamp,
    status,
    alerts,
    trends: [],
  };

  const previous = previousSnapshot(snapshot, prior);
  if (previous) {
    assessment.trends = computeTrends(snapshot, previous);
    assessment.comparedWith = previous.timestamp;
  }
  return assessment;
}

export class VitalsMonitoringStage implements StageContract<VitalsView, VitalsAssessment> {
  readonly name = "VitalsMonitoring";
  private readonly thresholds: VitalsThresholds;

  constructor(thresholds: VitalsThresholds = DEFAULT_VITALS_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  async run(view: VitalsView): Promise<StageOutcome<VitalsAssessment>> {
    return success(assessVitals(view.snapshot, view.prior, this.thresholds), 1);
  }
}
