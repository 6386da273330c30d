/**
 * RUL 格式化
 * ============================================================
 *
 * 模型输出（抽象时间单位）→ 小时 → 最粗的合适区间：
 *
 *   hours ≥ 720 (30 天)  → months + days
 *   hours ≥ 168 (7 天)   → weeks + days
 *   hours ≥ 1            → days + hours
 *   其余                 → hours + minutes（分钟四舍五入，满 60 进位）
 *
 * 自上而下首个命中的区间生效，任何取值只落入一个区间。
 */

import type { RulFormatOptions, RulResult, RulUnit } from './types';

export const HOURS_PER_DAY = 24;
export const HOURS_PER_WEEK = 7 * HOURS_PER_DAY;
export const HOURS_PER_MONTH = 30 * HOURS_PER_DAY;

const DEFAULT_MINUTES_PER_UNIT = 10;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count !== 1 ? 's' : ''}`;
}

/** 主量 + 次量；次量为 0 时省略 */
function render(primary: number, primaryUnit: string, secondary: number, secondaryUnit: string): string {
  const head = plural(primary, primaryUnit);
  return secondary === 0 ? head : `${head} ${plural(secondary, secondaryUnit)}`;
}

/** 负值与非有限值视为 0 */
export function predictionToHours(rawValue: number, minutesPerUnit: number = DEFAULT_MINUTES_PER_UNIT): number {
  const hours = rawValue * minutesPerUnit / 60;
  return Number.isFinite(hours) && hours > 0 ? hours : 0;
}

export function selectBucket(hours: number): RulUnit {
  if (hours >= HOURS_PER_MONTH) return 'months';
  if (hours >= HOURS_PER_WEEK) return 'weeks';
  if (hours >= 1) return 'days';
  return 'hours';
}

export function formatHours(hours: number): RulResult {
  switch (selectBucket(hours)) {
    case 'months': {
      const months = Math.floor(hours / HOURS_PER_MONTH);
      const days = Math.floor((hours % HOURS_PER_MONTH) / HOURS_PER_DAY);
      return { value: hours, unit: 'months', months, days, formatted: render(months, 'month', days, 'day') };
    }
    case 'weeks': {
      const weeks = Math.floor(hours / HOURS_PER_WEEK);
      const days = Math.floor((hours % HOURS_PER_WEEK) / HOURS_PER_DAY);
      return { value: hours, unit: 'weeks', weeks, days, formatted: render(weeks, 'week', days, 'day') };
    }
    case 'days': {
      // 此分支只为让 1 小时（pred = 6，每单位 10 分钟）显示为 "1 day"；
      // [1h, 24h) 内的值都报告为 1 天，不带余量。健康等级仍按实际小数小时判定
      if (hours < HOURS_PER_DAY) {
        return { value: hours, unit: 'days', days: 1, hours: 0, formatted: plural(1, 'day') };
      }
      const days = Math.floor(hours / HOURS_PER_DAY);
      const rem = Math.floor(hours % HOURS_PER_DAY);
      return { value: hours, unit: 'days', days, hours: rem, formatted: render(days, 'day', rem, 'hour') };
    }
    case 'hours': {
      let h = Math.floor(hours);
      let m = Math.round((hours - h) * 60);
      if (m === 60) {
        h += 1;
        m = 0;
      }
      return { value: hours, unit: 'hours', hours: h, minutes: m, formatted: render(h, 'hour', m, 'minute') };
    }
  }
}

/** 模型原始输出 → 区间描述 */
export function formatRul(rawValue: number, options: RulFormatOptions = {}): RulResult {
  return formatHours(predictionToHours(rawValue, options.minutesPerUnit));
}
