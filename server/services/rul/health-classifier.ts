/**
 * 设备健康等级
 * 按剩余小时数划分 5 档，每档下界包含在本档内
 */

import { HOURS_PER_DAY, HOURS_PER_MONTH, HOURS_PER_WEEK } from './rul-formatter';
import type { HealthAssessment, HealthStatus } from './types';

const HEALTH_BANDS: ReadonlyArray<{ minHours: number; status: HealthStatus; label: string }> = [
  { minHours: HOURS_PER_MONTH, status: 'EXCELLENT', label: 'EXCELLENT (>30 days)' },
  { minHours: HOURS_PER_WEEK, status: 'GOOD', label: 'GOOD (>7 days)' },
  { minHours: HOURS_PER_DAY, status: 'MODERATE', label: 'MODERATE (>1 day)' },
  { minHours: 12, status: 'POOR', label: 'POOR (>12 hours)' },
];

const CRITICAL: HealthAssessment = { status: 'CRITICAL', label: 'CRITICAL (<12 hours)' };

export function classifyHealth(hours: number): HealthAssessment {
  for (const band of HEALTH_BANDS) {
    if (hours >= band.minHours) return { status: band.status, label: band.label };
  }
  return { ...CRITICAL };
}
