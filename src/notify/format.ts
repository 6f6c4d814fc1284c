import type { Alert, Severity } from '../types/index.js';

export function severityEmoji(s: Severity): string {
  switch (s) {
    case 'CRITICAL':
      return '🔴';
    case 'HIGH':
      return '🟠';
    case 'MEDIUM':
      return '🟡';
    case 'LOW':
      return '🟢';
    case 'INFO':
      return '🔵';
  }
}

export function severityColor(s: Severity): string {
  switch (s) {
    case 'CRITICAL':
      return '#d32f2f';
    case 'HIGH':
      return '#f57c00';
    case 'MEDIUM':
      return '#fbc02d';
    case 'LOW':
      return '#388e3c';
    case 'INFO':
      return '#1976d2';
  }
}

/** `[HIGH] checkout-anomalies - Anomaly Detected: ...`, used as subject and fallback text. */
export function summaryLine(alert: Alert): string {
  return `[${alert.severity}] ${alert.alertRuleName} - ${alert.title}`;
}
