/**
 * 频域特征与扩展通道分析测试
 */
import { describe, it, expect } from 'vitest';
import { analyzeChannel, extractSpectralFeatures } from '../extractors/spectral.extractor';
import { dft, fft, powerSpectrum } from '../dsp-utils';

describe('extractSpectralFeatures', () => {
  it('2 的幂次长度：纯正弦的主频与频谱熵', () => {
    const n = 64;
    const signal = Array.from({ length: n }, (_, t) => Math.sin(2 * Math.PI * 4 * t / n));
    const features = extractSpectralFeatures(signal, 64);
    expect(features.dominant_frequency).toBe(4);
    // 能量集中在 ±4 两个频点
    expect(features.spectral_entropy).toBeCloseTo(Math.LN2, 6);
  });

  it('非 2 的幂次长度走 DFT', () => {
    const n = 10;
    const signal = Array.from({ length: n }, (_, t) => Math.cos(2 * Math.PI * 2 * t / n));
    const features = extractSpectralFeatures(signal, 10);
    expect(features.dominant_frequency).toBe(2);
    expect(features.spectral_entropy).toBeCloseTo(Math.LN2, 6);
  });

  it('主频按 sampleRate / n 换算', () => {
    const n = 32;
    const signal = Array.from({ length: n }, (_, t) => Math.sin(2 * Math.PI * 3 * t / n));
    expect(extractSpectralFeatures(signal, 1000).dominant_frequency).toBe(3 * 1000 / 32);
  });

  it('全零信号：熵与主频均为 0', () => {
    expect(extractSpectralFeatures([0, 0, 0, 0], 100)).toEqual({
      spectral_entropy: 0,
      dominant_frequency: 0,
    });
  });

  it('单点信号主频为 0', () => {
    expect(extractSpectralFeatures([3], 100).dominant_frequency).toBe(0);
  });
});

describe('FFT / DFT', () => {
  it('FFT 与 DFT 结果一致', () => {
    const data = [1, 2, 3, 4, 0, -1, 0.5, 2];
    const [fr, fi] = fft(data);
    const [dr, di] = dft(data);
    fr.forEach((v, i) => expect(v).toBeCloseTo(dr[i], 9));
    fi.forEach((v, i) => expect(v).toBeCloseTo(di[i], 9));
  });

  it('FFT 拒绝非 2 的幂次长度', () => {
    expect(() => fft([1, 2, 3])).toThrow('power of two');
  });

  it('[1, 2, 3, 4] 的功率谱', () => {
    const power = powerSpectrum([1, 2, 3, 4]);
    expect(power[0]).toBeCloseTo(100, 9);
    expect(power[1]).toBeCloseTo(8, 9);
    expect(power[2]).toBeCloseTo(4, 9);
    expect(power[3]).toBeCloseTo(8, 9);
  });
});

describe('analyzeChannel', () => {
  it('8 维特征 + 方差 / 峰峰值 / 极值 + 频域', () => {
    const result = analyzeChannel([1, 2, 3, 4], 4);
    expect(result.mean).toBe(2.5);
    expect(result.variance).toBe(1.25);
    expect(result.peak_to_peak).toBe(3);
    expect(result.max).toBe(4);
    expect(result.min).toBe(1);
    // 非负频点 [0, 2) 中直流分量最大
    expect(result.dominant_frequency).toBe(0);

    const p = [100, 8, 4, 8].map(v => v / 120);
    const expected = -p.reduce((h, pi) => h + pi * Math.log(pi), 0);
    expect(result.spectral_entropy).toBeCloseTo(expected, 9);
  });
});
