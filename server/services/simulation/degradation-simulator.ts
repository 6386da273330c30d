/**
 * 退化信号仿真器
 * ============================================================
 *
 * 生成一台旋转设备从新装到失效的合成传感器序列：
 *   - ADXL335 三轴加速度（g）：重力 + 主振动 + 谐波 + 噪声 + 故障冲击
 *   - 模拟振动传感器电压（V）：基线 + 退化斜坡 + 高频分量 + 噪声 + 冲击
 *
 * 结构确定（分段曲线），细节随机（RandomSource 可注入、可复现）。
 * 单个实例不可并发推进；并发仿真请各自持有实例。
 */

import { ValidationError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import {
  VIBRATION_LEVEL_LABELS,
  type PhaseInfo,
  type SensorSample,
  type Vector3,
  type VibrationLevel,
} from '../../../shared/sensorTypes';
import { bandLabel, evaluateCurve } from './degradation-curve';
import { SIX_MONTH_LIFECYCLE } from './degradation-profile';
import { createRandomSource } from './random';
import type {
  DegradationProfile,
  DegradationSimulatorOptions,
  DegradationState,
  LevelThresholds,
  RandomSource,
} from './types';

const log = createModuleLogger('degradation-simulator');

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** 振动等级：< moderate → Low，< high → Moderate，否则 High */
export function classifyVibrationLevel(voltage: number, thresholds: LevelThresholds): VibrationLevel {
  if (voltage < thresholds.moderate) return 'Low';
  if (voltage < thresholds.high) return 'Moderate';
  return 'High';
}

export class DegradationSimulator {
  readonly duration: number;
  readonly samplingRate: number;
  readonly totalSamples: number;
  readonly profile: DegradationProfile;

  private currentSample = 0;
  private readonly random: RandomSource;
  private readonly clock: () => number;

  constructor(options: DegradationSimulatorOptions) {
    const { duration, samplingRate } = options;
    const totalSamples = Math.floor(duration * samplingRate);
    if (!Number.isFinite(totalSamples) || totalSamples < 1) {
      throw new ValidationError('duration * samplingRate must yield at least one sample', {
        duration,
        samplingRate,
      });
    }

    this.duration = duration;
    this.samplingRate = samplingRate;
    this.totalSamples = totalSamples;
    this.profile = options.profile ?? SIX_MONTH_LIFECYCLE;
    this.random = options.random ?? createRandomSource();
    this.clock = options.clock ?? (() => Date.now() / 1000);

    log.debug({ totalSamples, profile: this.profile.name }, 'Simulator initialized');
  }

  get state(): DegradationState {
    return { currentSample: this.currentSample, totalSamples: this.totalSamples };
  }

  /** currentSample / totalSamples ∈ [0, 1] */
  get progress(): number {
    return this.currentSample / this.totalSamples;
  }

  degradationFactor(): number {
    return evaluateCurve(this.profile.degradation, this.progress);
  }

  phaseInfo(): PhaseInfo {
    const progress = this.progress;
    return {
      phase: bandLabel(this.profile.phases, progress),
      stage_detail: bandLabel(this.profile.stages, progress),
      progress_percent: progress * 100,
      degradation_factor: this.degradationFactor(),
      time_elapsed: this.currentSample / this.samplingRate,
      remaining_time: (this.totalSamples - this.currentSample) / this.samplingRate,
    };
  }

  /**
   * 生成下一个样本并推进一步
   * @returns 仿真结束（currentSample === totalSamples）时返回 null
   */
  advanceToNextSample(): SensorSample | null {
    if (this.currentSample >= this.totalSamples) {
      return null;
    }

    const accelerometer = this.simulateAccelerometer();
    const voltage = this.simulateVibrationVoltage();
    const level = classifyVibrationLevel(voltage, this.profile.levels);

    const sample: SensorSample = {
      timestamp: this.clock(),
      sample_number: this.currentSample + 1,
      accelerometer: {
        x: round3(accelerometer.x),
        y: round3(accelerometer.y),
        z: round3(accelerometer.z),
      },
      vibration: {
        voltage: round3(voltage),
        level: VIBRATION_LEVEL_LABELS[level],
      },
      phase_info: this.phaseInfo(),
    };

    this.currentSample += 1;
    return sample;
  }

  reset(): void {
    this.currentSample = 0;
  }

  isComplete(): boolean {
    return this.currentSample >= this.totalSamples;
  }

  // ============================================================
  // 信号合成
  // ============================================================

  private get timeFactor(): number {
    return this.currentSample / this.samplingRate;
  }

  private simulateAccelerometer(): Vector3 {
    const m = this.profile.accelerometer;
    const d = this.degradationFactor();
    const t = this.timeFactor;

    const amplitude = m.baseAmplitude + d * m.amplitudeGain;
    const primaryFreq = m.baseFrequency + d * m.frequencyGain;
    const primary = amplitude * Math.sin(2 * Math.PI * primaryFreq * t);

    // 轴承/齿轮问题带来的谐波，仅在退化超过阈值后出现
    let harmonic = 0;
    if (d > m.harmonicThreshold) {
      harmonic = d * m.harmonicGain * Math.sin(2 * Math.PI * primaryFreq * m.harmonicRatio * t);
    }

    const noiseStd = m.noiseBase + d * m.noiseGain;
    const noiseX = this.random.gaussian(0, noiseStd);
    const noiseY = this.random.gaussian(0, noiseStd);
    const noiseZ = this.random.gaussian(0, noiseStd);

    let fault = 0;
    if (this.random.next() < d * m.faultProbabilityGain) {
      fault = this.random.uniform(m.faultMin, m.faultMax) * d;
    }

    const [px, py, pz] = m.primaryRatios;
    const [hx, hy, hz] = m.harmonicRatios;
    const [fx, fy, fz] = m.faultRatios;

    return {
      x: primary * px + harmonic * hx + noiseX + fault * fx,
      y: primary * py + harmonic * hy + noiseY + fault * fy,
      z: m.gravity + primary * pz + harmonic * hz + noiseZ + fault * fz,
    };
  }

  private simulateVibrationVoltage(): number {
    const m = this.profile.vibration;
    const d = this.degradationFactor();
    const t = this.timeFactor;

    // 电压斜坡按进度分段，段内以退化因子为输入
    const ramp = evaluateCurve(this.profile.vibrationVoltage, this.progress, d);

    const mainFreq = m.baseFrequency + d * m.frequencyGain;
    const main = ramp * m.mainGain * (1 + Math.sin(2 * Math.PI * mainFreq * t));

    let highFrequency = 0;
    if (d > m.highFrequencyThreshold) {
      const hfAmplitude = (d - m.highFrequencyThreshold) * m.highFrequencyGain;
      highFrequency = hfAmplitude * Math.abs(Math.sin(2 * Math.PI * mainFreq * m.highFrequencyRatio * t));
    }

    const noise = this.random.gaussian(0, m.noiseBase + d * m.noiseGain);

    let shock = 0;
    if (this.random.next() < d * m.shockProbabilityGain) {
      shock = this.random.uniform(m.shockMin, m.shockMax) * d;
    }

    const total = m.baseVoltage + main + highFrequency + noise + shock;
    return Math.max(m.minVoltage, Math.min(m.maxVoltage, total));
  }
}
