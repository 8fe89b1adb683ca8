// Investigation input: the alert as received from the alert router

export type Severity = 'info' | 'warning' | 'critical';

export const SEVERITIES: readonly Severity[] = ['info', 'warning', 'critical'];

export interface Alert {
  readonly name: string;                      // alert rule identifier, e.g. KubePodCrashLooping
  readonly labels: Readonly<Record<string, string>>;
  readonly severity: Severity;
  readonly description: string;
  readonly fingerprint?: string;              // carried for log correlation only
}

export interface InvestigationRequest {
  readonly requestId: string;                 // caller-supplied, correlation only (not deduplication)
  readonly alert: Alert;
}
