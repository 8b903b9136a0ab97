export interface SplineAnchors {
  // Lateral endpoints (SPLINE_X), mm
  x: readonly [number, number]
  // Height endpoints (SPLINE_Z), mm
  z: readonly [number, number]
  // dx/dz at the start and end anchors
  startSlope?: number
  endSlope?: number
}

export interface CurveSample {
  height: number
  lateralOffset: number
  tangentAngle: number
}

export const DEFAULT_START_SLOPE = 0
export const DEFAULT_END_SLOPE = 2.5

const RAD_TO_DEG = 180 / Math.PI

/**
 * Clamped cubic profile x(z) through (z0, x0) and (z1, x1) with fixed end
 * slopes, evaluated in Hermite form. Outside [z0, z1] the same polynomial is
 * extrapolated.
 */
export class SplineCurve {
  readonly x0: number
  readonly x1: number
  readonly z0: number
  readonly z1: number
  readonly startSlope: number
  readonly endSlope: number

  constructor(anchors: SplineAnchors) {
    const [x0, x1] = anchors.x
    const [z0, z1] = anchors.z
    if (!(z1 > z0)) {
      throw new RangeError(`Spline height range must increase, got [${z0}, ${z1}]`)
    }

    this.x0 = x0
    this.x1 = x1
    this.z0 = z0
    this.z1 = z1
    this.startSlope = anchors.startSlope ?? DEFAULT_START_SLOPE
    this.endSlope = anchors.endSlope ?? DEFAULT_END_SLOPE
  }

  get span(): number {
    return this.z1 - this.z0
  }

  isDefinedAt(z: number): boolean {
    return z >= this.z0 && z <= this.z1
  }

  valueAt(z: number): number {
    return this.x0 + this.lateralOffsetAt(z)
  }

  // Δ(z): displacement of the bend axis relative to the start anchor
  lateralOffsetAt(z: number): number {
    const h = this.span
    const t = (z - this.z0) / h
    const t2 = t * t
    const t3 = t2 * t

    // Базисные функции Эрмита (h00 = 1 - h01 сокращается с x0)
    const h10 = t3 - 2 * t2 + t
    const h01 = -2 * t3 + 3 * t2
    const h11 = t3 - t2

    return (this.x1 - this.x0) * h01 + h * (this.startSlope * h10 + this.endSlope * h11)
  }

  // dx/dz
  slopeAt(z: number): number {
    const h = this.span
    const t = (z - this.z0) / h
    const t2 = t * t

    const d10 = 3 * t2 - 4 * t + 1
    const d01 = -6 * t2 + 6 * t
    const d11 = 3 * t2 - 2 * t

    return ((this.x1 - this.x0) * d01) / h + this.startSlope * d10 + this.endSlope * d11
  }

  // θ(z) = atan(dx/dz), degrees
  tangentAngleAt(z: number): number {
    return Math.atan(this.slopeAt(z)) * RAD_TO_DEG
  }

  evaluate(z: number): CurveSample {
    return {
      height: z,
      lateralOffset: this.lateralOffsetAt(z),
      tangentAngle: this.tangentAngleAt(z)
    }
  }

  // От z0 до z1 включительно
  sample(step: number): CurveSample[] {
    if (!(step > 0)) {
      throw new RangeError(`Sample step must be positive, got ${step}`)
    }

    const samples: CurveSample[] = []
    const count = Math.floor(this.span / step + 1e-9)
    for (let i = 0; i <= count; i++) {
      samples.push(this.evaluate(this.z0 + i * step))
    }
    if (samples[samples.length - 1].height < this.z1) {
      samples.push(this.evaluate(this.z1))
    }
    return samples
  }
}
