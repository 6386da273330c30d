/**
 * 数字信号处理工具库
 * ============================================================
 *
 * 纯 TypeScript 实现，无外部依赖
 * 包含 FFT / DFT、统计函数、直方图与 Shannon 熵
 *
 * 算法参考：
 *   - Cooley-Tukey FFT (radix-2 DIT)
 *   - 等宽直方图（末箱为闭区间）
 *
 * 退化输入（空序列、长度 1、方差为 0）不抛异常，
 * 每个函数在入口处检查并返回其定义的回退值。
 */

// ============================================================
// FFT（快速傅里叶变换）
// ============================================================

/**
 * Radix-2 DIT FFT
 * 输入长度必须是 2 的幂次
 *
 * @param real 实部数组
 * @param imag 虚部数组（可选，默认全零）
 * @returns [real[], imag[]] 频域实部和虚部
 */
export function fft(real: readonly number[], imag?: readonly number[]): [number[], number[]] {
  const n = real.length;
  if (n === 0) return [[], []];

  if (!isPowerOfTwo(n)) {
    throw new Error(`FFT input length must be a power of two, got ${n}`);
  }

  const re = [...real];
  const im = imag ? [...imag] : new Array<number>(n).fill(0);

  // 位反转排列
  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) {
      j ^= bit;
    }
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }

  // 蝶形运算
  for (let len = 2; len <= n; len <<= 1) {
    const halfLen = len >> 1;
    const angle = -2 * Math.PI / len;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);

    for (let i = 0; i < n; i += len) {
      let curRe = 1;
      let curIm = 0;

      for (let j = 0; j < halfLen; j++) {
        const uRe = re[i + j];
        const uIm = im[i + j];
        const vRe = re[i + j + halfLen] * curRe - im[i + j + halfLen] * curIm;
        const vIm = re[i + j + halfLen] * curIm + im[i + j + halfLen] * curRe;

        re[i + j] = uRe + vRe;
        im[i + j] = uIm + vIm;
        re[i + j + halfLen] = uRe - vRe;
        im[i + j + halfLen] = uIm - vIm;

        const newCurRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = newCurRe;
      }
    }
  }

  return [re, im];
}

/** 直接 DFT，O(n²)，用于非 2 的幂次长度 */
export function dft(real: readonly number[]): [number[], number[]] {
  const n = real.length;
  const re = new Array<number>(n).fill(0);
  const im = new Array<number>(n).fill(0);
  for (let k = 0; k < n; k++) {
    let sumRe = 0;
    let sumIm = 0;
    for (let t = 0; t < n; t++) {
      const angle = -2 * Math.PI * k * t / n;
      sumRe += real[t] * Math.cos(angle);
      sumIm += real[t] * Math.sin(angle);
    }
    re[k] = sumRe;
    im[k] = sumIm;
  }
  return [re, im];
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/**
 * 双边功率谱 |X_k|²（长度 n，不补零）
 * 2 的幂次长度走 FFT，其余走 DFT
 */
export function powerSpectrum(data: readonly number[]): number[] {
  if (data.length === 0) return [];
  const [re, im] = isPowerOfTwo(data.length) ? fft(data) : dft(data);
  return re.map((r, i) => r * r + im[i] * im[i]);
}

/**
 * 主频：非负频率区间 [0, n/2) 内功率最大的频点
 * @returns 频率（Hz），即 index * sampleRate / n
 */
export function dominantFrequency(power: readonly number[], sampleRate: number): number {
  const n = power.length;
  const half = Math.floor(n / 2);
  if (half === 0) return 0;

  let maxIdx = 0;
  let maxVal = power[0];
  for (let i = 1; i < half; i++) {
    if (power[i] > maxVal) {
      maxVal = power[i];
      maxIdx = i;
    }
  }
  return maxIdx * sampleRate / n;
}

// ============================================================
// 统计函数
// ============================================================

/** 均值 */
export function mean(data: readonly number[]): number {
  if (data.length === 0) return 0;
  return data.reduce((a, b) => a + b, 0) / data.length;
}

/** 是否所有值都相等（空序列视为常数） */
export function isConstant(data: readonly number[]): boolean {
  for (let i = 1; i < data.length; i++) {
    if (data[i] !== data[0]) return false;
  }
  return true;
}

/** 总体方差；常数序列严格为 0 */
export function variance(data: readonly number[]): number {
  if (data.length < 2 || isConstant(data)) return 0;
  const m = mean(data);
  return data.reduce((a, b) => a + (b - m) ** 2, 0) / data.length;
}

/** 总体标准差 */
export function stdDev(data: readonly number[]): number {
  return Math.sqrt(variance(data));
}

/** RMS（均方根） */
export function rms(data: readonly number[]): number {
  if (data.length === 0) return 0;
  return Math.sqrt(data.reduce((a, b) => a + b * b, 0) / data.length);
}

/** 最大值 */
export function max(data: readonly number[]): number {
  if (data.length === 0) return 0;
  let m = data[0];
  for (const v of data) if (v > m) m = v;
  return m;
}

/** 最小值 */
export function min(data: readonly number[]): number {
  if (data.length === 0) return 0;
  let m = data[0];
  for (const v of data) if (v < m) m = v;
  return m;
}

/** 峰值（绝对值最大） */
export function peak(data: readonly number[]): number {
  let m = 0;
  for (const v of data) {
    const a = Math.abs(v);
    if (a > m) m = a;
  }
  return m;
}

/** 峰峰值 */
export function peakToPeak(data: readonly number[]): number {
  if (data.length === 0) return 0;
  return max(data) - min(data);
}

/** 中心矩 */
function centralMoment(data: readonly number[], order: number, m: number): number {
  return data.reduce((a, b) => a + (b - m) ** order, 0) / data.length;
}

/**
 * Fisher 超值峭度（有偏估计，正态分布 = 0）
 * 长度 ≤ 1 或标准差为 0 时为 0
 */
export function kurtosis(data: readonly number[]): number {
  if (data.length <= 1 || stdDev(data) === 0) return 0;
  const m = mean(data);
  const m2 = centralMoment(data, 2, m);
  const m4 = centralMoment(data, 4, m);
  return m4 / (m2 * m2) - 3;
}

/**
 * 偏度（有偏估计）
 * 长度 ≤ 1 或标准差为 0 时为 0
 */
export function skewness(data: readonly number[]): number {
  if (data.length <= 1 || stdDev(data) === 0) return 0;
  const m = mean(data);
  const m2 = centralMoment(data, 2, m);
  const m3 = centralMoment(data, 3, m);
  return m3 / m2 ** 1.5;
}

/** 波峰因子（Crest Factor）：rms 为 0 时为 0 */
export function crestFactor(data: readonly number[]): number {
  const r = rms(data);
  if (r === 0) return 0;
  return peak(data) / r;
}

// ============================================================
// 直方图与熵
// ============================================================

/**
 * 等宽直方图
 * 分箱覆盖 [min, max]，末箱为闭区间；min === max 时范围取 [min - 0.5, max + 0.5]
 */
export function histogram(data: readonly number[], bins: number): number[] {
  if (bins < 1 || data.length === 0) return [];

  let lo = min(data);
  let hi = max(data);
  if (lo === hi) {
    lo -= 0.5;
    hi += 0.5;
  }

  const edges = new Array<number>(bins + 1);
  const step = (hi - lo) / bins;
  for (let i = 0; i < bins; i++) edges[i] = lo + i * step;
  edges[bins] = hi;

  const counts = new Array<number>(bins).fill(0);
  const norm = bins / (hi - lo);
  for (const v of data) {
    let idx = Math.floor((v - lo) * norm);
    if (idx >= bins) idx = bins - 1;
    // 浮点误差修正：以边界数组为准
    if (idx > 0 && v < edges[idx]) idx -= 1;
    if (idx < bins - 1 && v >= edges[idx + 1]) idx += 1;
    counts[idx] += 1;
  }
  return counts;
}

/**
 * Shannon 熵
 * 先剔除零概率项再归一化；总量为 0 时返回 0
 * @param base 对数底，默认自然对数
 */
export function shannonEntropy(weights: readonly number[], base: number = Math.E): number {
  const nonZero = weights.filter(w => w > 0);
  const total = nonZero.reduce((a, b) => a + b, 0);
  if (total === 0) return 0;
  let h = 0;
  for (const w of nonZero) {
    const p = w / total;
    h -= p * Math.log(p);
  }
  return base === Math.E ? h : h / Math.log(base);
}

/**
 * 直方图熵
 * 分箱数 min(maxBins, floor(n/2))；非零箱少于 2 个时为 0
 */
export function histogramEntropy(
  data: readonly number[],
  maxBins: number = 50,
  base: number = Math.E,
): number {
  const bins = Math.min(maxBins, Math.floor(data.length / 2));
  if (data.length <= 1 || bins < 1) return 0;
  const counts = histogram(data, bins).filter(c => c > 0);
  if (counts.length < 2) return 0;
  return shannonEntropy(counts, base);
}

/** 频谱熵：归一化功率谱（剔除零功率频点）的 Shannon 熵 */
export function spectralEntropy(power: readonly number[], base: number = Math.E): number {
  return shannonEntropy(power, base);
}
