import { SplineCurve } from './SplineCurve'

/**
 * Maps a print height to the curve height whose arc length from the start
 * anchor first reaches it. Lengths are accumulated over chords of fixed
 * vertical step, so results land on multiples of that step.
 */
export class ArcLengthMap {
  private readonly lengths: number[] = [0]

  constructor(
    private readonly curve: SplineCurve,
    readonly step: number
  ) {
    if (!(step > 0)) {
      throw new RangeError(`Discretization length must be positive, got ${step}`)
    }

    const count = Math.floor(curve.span / step + 1e-9)
    for (let i = 1; i <= count; i++) {
      const z = curve.z0 + i * step
      const dx = curve.lateralOffsetAt(z) - curve.lateralOffsetAt(z - step)
      this.lengths.push(this.lengths[i - 1] + Math.sqrt(dx * dx + step * step))
    }
  }

  get totalLength(): number {
    return this.lengths[this.lengths.length - 1]
  }

  // null когда кривая короче заданной высоты
  heightAt(printHeight: number): number | null {
    const target = printHeight - this.curve.z0
    const index = this.lengths.findIndex(length => length >= target)
    return index === -1 ? null : this.curve.z0 + index * this.step
  }
}
