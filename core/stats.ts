/** Welford's online mean/variance over per-round nets. */
export class RunningStats {
  private n = 0;
  private m = 0;
  private m2 = 0;

  push(value: number): void {
    this.n += 1;
    const delta = value - this.m;
    this.m += delta / this.n;
    this.m2 += delta * (value - this.m);
  }

  get count(): number {
    return this.n;
  }

  get mean(): number {
    return this.n > 0 ? this.m : 0;
  }

  variance(): number {
    if (this.n < 2) return 0;
    return this.m2 / (this.n - 1);
  }

  stdev(): number {
    return Math.sqrt(this.variance());
  }

  /** Normal-approximation interval for the mean; z = 1.96 gives 95%. */
  confidenceInterval(z = 1.96): [number, number] {
    if (this.n === 0) return [0, 0];
    const margin = (this.stdev() / Math.sqrt(this.n)) * z;
    return [this.mean - margin, this.mean + margin];
  }
}
