export type Severity = "low" | "medium" | "high" | "critical";

const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const SEVERITIES: readonly Severity[] = ["low", "medium", "high", "critical"];

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

export interface Diagnosis {
  name: string;
  icd10Code: string;
  confidence: number;
  supportingSymptoms: string[];
  reasoning?: string;
  urgency?: Severity;
}

export interface DiagnosisReport {
  /** Ranked by confidence, highest first; the first entry is the primary diagnosis. */
  diagnoses: Diagnosis[];
  recommendedTests: string[];
  redFlags: string[];
}

export interface Evidence {
  id: string;
  title: string;
  url: string;
  journal?: string;
  year?: number;
  authors?: string[];
}

export type EvidenceLevel = "high" | "moderate" | "low" | "unknown";

export interface EvidenceFinding {
  diagnosis: string;
  supported: boolean;
  summary: string;
}

export interface EvidenceReport {
  evidenceLevel: EvidenceLevel;
  findings: EvidenceFinding[];
  recommendations: string[];
  sources: Evidence[];
}

export interface Medication {
  name: string;
  dose: string;
  frequency: string;
  duration?: string;
  route?: string;
}

export interface MonitoringProtocol {
  vitalSigns: string[];
  labTests: string[];
  frequency: string;
}

export type ContraindicationKind = "allergy" | "interaction";

export interface ContraindicationFlag {
  medication: string;
  kind: ContraindicationKind;
  conflictsWith: string;
  severity: Severity;
  detail: string;
}

export interface TreatmentPlan {
  medications: Medication[];
  nonPharmacological: string[];
  monitoringProtocol: MonitoringProtocol;
  followUp: string;
  patientEducation: string[];
  contraindications: ContraindicationFlag[];
}

export interface ComplianceCheck {
  passed: boolean;
  rationale: string;
}

export type RiskLevel = Severity;

export type SafetyRecommendation = "approve" | "approve_with_caveats" | "reject";

const RECOMMENDATION_RANK: Record<SafetyRecommendation, number> = {
  approve: 0,
  approve_with_caveats: 1,
  reject: 2,
};

export function stricterRecommendation(
  a: SafetyRecommendation,
  b: SafetyRecommendation,
): SafetyRecommendation {
  return RECOMMENDATION_RANK[a] >= RECOMMENDATION_RANK[b] ? a : b;
}

export interface SafetyConcern {
  severity: Severity;
  description: string;
  /** Set when the concern restates a treatment contraindication. */
  contraindication?: { medication: string; conflictsWith: string };
}

export interface SafetyReview {
  compliance: {
    hipaa: ComplianceCheck;
    fda: ComplianceCheck;
    ethics: ComplianceCheck;
  };
  riskLevel: RiskLevel;
  recommendation: SafetyRecommendation;
  concerns: SafetyConcern[];
}

/**
 * Drug interaction or cross-reactivity entry from the interaction table.
 * `interactsWith` may name a drug, a drug class or an allergen.
 */
export interface InteractionRecord {
  drug: string;
  interactsWith: string;
  severity: Severity;
  description: string;
}
