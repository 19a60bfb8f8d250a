/**
 * Deterministic Pseudo-Random Number Generator (xorshift32)
 * 确定性伪随机数生成器（xorshift32）
 *
 * Installed as a world resource; bullet spread and particle jitter draw
 * from it, so a match replays identically for the same seed and inputs.
 * 作为World资源安装；子弹散布和粒子抖动都从中取数，相同种子和输入下比赛可完全重现。
 */

export class PRNG {
  private s: number;

  constructor(seed = 0x2F6E2B1) {
    this.s = PRNG.normalize(seed);
  }

  /**
   * xorshift has an all-zero fixed point, so a zero seed is replaced
   * xorshift在全零状态下停滞，因此替换零种子
   */
  private static normalize(x: number): number {
    const s = x >>> 0;
    return s === 0 ? 0x2F6E2B1 : s;
  }

  /**
   * Set the seed for random number generation
   * 设置随机数生成种子
   */
  seed(x: number): void {
    this.s = PRNG.normalize(x);
  }

  /**
   * Generate next 32-bit unsigned integer
   * 生成下一个32位无符号整数
   */
  nextU32(): number {
    let x = this.s;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x >>> 0;
    return this.s;
  }

  /**
   * Generate next float in range [0,1)
   * 生成范围[0,1)内的浮点数
   */
  nextFloat(): number {
    return (this.nextU32() >>> 8) / 0x01000000;
  }

  /**
   * Generate random integer in range [min, max]
   * 生成范围[min, max]内的随机整数
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.nextFloat() * (max - min + 1)) + min;
  }

  /**
   * Uniform float in [min, max); returns min when the range is empty
   * [min, max)内的均匀浮点数；区间为空时返回min
   */
  range(min: number, max: number): number {
    return min + this.nextFloat() * (max - min);
  }

  /**
   * Symmetric jitter in [-amount, amount)
   * [-amount, amount)内的对称抖动
   */
  jitter(amount: number): number {
    return this.range(-amount, amount);
  }

  nextBool(): boolean {
    return this.nextFloat() < 0.5;
  }

  getState(): number {
    return this.s;
  }

  /**
   * Set internal state for deterministic reproduction
   * 设置内部状态以确定性重现
   */
  setState(state: number): void {
    this.s = PRNG.normalize(state);
  }
}
