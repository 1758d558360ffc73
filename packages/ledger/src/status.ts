import { formatDate } from './timestamps';
import type { FleetStatus, LedgerEvent, StatusColor } from './types';
import { toRecord, trimmedString } from './values';

export const DEFAULT_QC_OVERDUE_DAYS = 120;

const DAY_MS = 24 * 60 * 60 * 1000;

export const STATUS_BADGES: Record<StatusColor, string> = {
  red: '🔴 Offline',
  yellow: '🟡 Warning',
  green: '🟢 Online'
};

const MAINTENANCE_REASON_FIELDS = ['reason_details', 'action_details', 'action'] as const;

export interface StatusOptions {
  now?: Date;
  /** 0 turns the overdue rule off. */
  qcOverdueDays?: number;
}

function eventDate(event: LedgerEvent | undefined): string {
  if (!event || event.timestamp.source === 'sentinel') {
    return '';
  }
  return formatDate(event.timestamp.value);
}

export function maintenanceStatusAfter(event: LedgerEvent | undefined): string {
  return event ? trimmedString(event.data.microscope_status_after).toLowerCase() : '';
}

function maintenanceReason(event: LedgerEvent | undefined): string {
  if (!event) {
    return '';
  }
  for (const field of MAINTENANCE_REASON_FIELDS) {
    const value = trimmedString(event.data[field]);
    if (value) {
      return value;
    }
  }
  return '';
}

export function qcOverallStatus(event: LedgerEvent | undefined): string {
  const evaluation = toRecord(event?.data.evaluation);
  return evaluation ? trimmedString(evaluation.overall_status).toLowerCase() : '';
}

function qcReason(event: LedgerEvent | undefined): string {
  const evaluation = toRecord(event?.data.evaluation);
  if (!evaluation || !Array.isArray(evaluation.results) || evaluation.results.length === 0) {
    return '';
  }
  const first = toRecord(evaluation.results[0]);
  return first ? trimmedString(first.message) : '';
}

/**
 * Derives the fleet-health status from the newest QC session and maintenance event.
 * Rules in priority order: offline, limited, QC overdue, online.
 */
export function evaluateInstrumentStatus(
  latestQc: LedgerEvent | undefined,
  latestMaintenance: LedgerEvent | undefined,
  options: StatusOptions = {}
): FleetStatus {
  const dates = {
    last_qc_date: eventDate(latestQc),
    last_maint_date: eventDate(latestMaintenance)
  };
  const build = (color: StatusColor, reason: string): FleetStatus => ({
    color,
    badge: STATUS_BADGES[color],
    reason,
    ...dates
  });

  const maintStatus = maintenanceStatusAfter(latestMaintenance);
  const qcStatus = qcOverallStatus(latestQc);
  const reason = maintenanceReason(latestMaintenance) || qcReason(latestQc);

  if (maintStatus === 'out_of_service' || qcStatus === 'fail') {
    return build('red', reason || 'Out of service');
  }

  if (maintStatus === 'limited' || qcStatus === 'warn') {
    return build('yellow', reason || 'Limited operation');
  }

  const overdueDays = options.qcOverdueDays ?? DEFAULT_QC_OVERDUE_DAYS;
  if (overdueDays > 0 && latestQc && latestQc.timestamp.source !== 'sentinel') {
    const now = options.now ?? new Date();
    if (latestQc.timestamp.value.getTime() <= now.getTime() - overdueDays * DAY_MS) {
      return build('yellow', `QC overdue (> ${overdueDays} days)`);
    }
  }

  return build('green', 'Operational');
}
