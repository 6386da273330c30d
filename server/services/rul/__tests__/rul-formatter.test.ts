/**
 * RUL 格式化与健康等级测试
 *
 * 覆盖范围：
 * - 区间边界（720 / 168 / 1 小时）
 * - 各区间的分解与复数形式
 * - 分钟满 60 进位
 * - 健康等级下界包含
 */
import { describe, it, expect } from 'vitest';
import { formatHours, formatRul, predictionToHours, selectBucket } from '../rul-formatter';
import { classifyHealth } from '../health-classifier';

describe('selectBucket 区间边界', () => {
  it.each([
    [720, 'months'],
    [719.999, 'weeks'],
    [168, 'weeks'],
    [167.999, 'days'],
    [1, 'days'],
    [0.999, 'hours'],
    [0, 'hours'],
  ])('%f 小时 → %s', (hours, unit) => {
    expect(selectBucket(hours)).toBe(unit);
    expect(formatHours(hours).unit).toBe(unit);
  });
});

describe('formatRul', () => {
  it('pred = 6、每单位 10 分钟 → 1 小时 → "1 day"', () => {
    expect(predictionToHours(6, 10)).toBe(1);
    expect(formatRul(6, { minutesPerUnit: 10 })).toEqual({
      value: 1,
      unit: 'days',
      days: 1,
      hours: 0,
      formatted: '1 day',
    });
  });

  it('[1h, 24h) 统一报告为 1 天，value 与健康等级保留实际小时', () => {
    const result = formatRul(9, { minutesPerUnit: 10 });
    expect(result).toEqual({ value: 1.5, unit: 'days', days: 1, hours: 0, formatted: '1 day' });
    expect(classifyHealth(result.value).status).toBe('CRITICAL');
  });

  it('默认每单位 10 分钟', () => {
    expect(formatRul(4320).formatted).toBe('1 month');
  });

  it('负值与非有限值按 0 处理', () => {
    expect(formatRul(-5).formatted).toBe('0 hours');
    expect(formatRul(Number.NaN).value).toBe(0);
    expect(formatRul(Number.POSITIVE_INFINITY).value).toBe(0);
  });

  it('自定义时间单位', () => {
    expect(formatRul(24, { minutesPerUnit: 60 }).formatted).toBe('1 day');
  });
});

describe('formatHours 分解', () => {
  it('months + days', () => {
    expect(formatHours(720)).toEqual({ value: 720, unit: 'months', months: 1, days: 0, formatted: '1 month' });
    expect(formatHours(744).formatted).toBe('1 month 1 day');
    expect(formatHours(1500)).toEqual({
      value: 1500, unit: 'months', months: 2, days: 2, formatted: '2 months 2 days',
    });
  });

  it('weeks + days', () => {
    expect(formatHours(168).formatted).toBe('1 week');
    expect(formatHours(200).formatted).toBe('1 week 1 day');
    expect(formatHours(719.999)).toEqual({
      value: 719.999, unit: 'weeks', weeks: 4, days: 1, formatted: '4 weeks 1 day',
    });
  });

  it('days + hours', () => {
    expect(formatHours(167.999)).toEqual({
      value: 167.999, unit: 'days', days: 6, hours: 23, formatted: '6 days 23 hours',
    });
    expect(formatHours(48).formatted).toBe('2 days');
    expect(formatHours(25).formatted).toBe('1 day 1 hour');
    expect(formatHours(49.5).formatted).toBe('2 days 1 hour');
  });

  it('不足一天报告为 1 天且不带余量', () => {
    expect(formatHours(1).formatted).toBe('1 day');
    expect(formatHours(23.5)).toEqual({ value: 23.5, unit: 'days', days: 1, hours: 0, formatted: '1 day' });
  });

  it('hours + minutes', () => {
    expect(formatHours(0.5)).toEqual({ value: 0.5, unit: 'hours', hours: 0, minutes: 30, formatted: '0 hours 30 minutes' });
    expect(formatHours(0.25).formatted).toBe('0 hours 15 minutes');
    expect(formatHours(0).formatted).toBe('0 hours');
  });

  it('分钟四舍五入到 60 时进位为 1 小时', () => {
    expect(formatHours(0.999)).toEqual({ value: 0.999, unit: 'hours', hours: 1, minutes: 0, formatted: '1 hour' });
  });
});

describe('classifyHealth', () => {
  it.each([
    [24 * 30 + 1, 'EXCELLENT'],
    [720, 'EXCELLENT'],
    [719.9, 'GOOD'],
    [168, 'GOOD'],
    [167.99, 'MODERATE'],
    [24, 'MODERATE'],
    [23.99, 'POOR'],
    [12, 'POOR'],
    [11.999, 'CRITICAL'],
    [0, 'CRITICAL'],
  ])('%f 小时 → %s', (hours, status) => {
    expect(classifyHealth(hours).status).toBe(status);
  });

  it('每档带有区分性的标签', () => {
    expect(classifyHealth(1000).label).toBe('EXCELLENT (>30 days)');
    expect(classifyHealth(200).label).toBe('GOOD (>7 days)');
    expect(classifyHealth(30).label).toBe('MODERATE (>1 day)');
    expect(classifyHealth(13).label).toBe('POOR (>12 hours)');
    expect(classifyHealth(1).label).toBe('CRITICAL (<12 hours)');
  });
});
