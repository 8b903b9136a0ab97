export interface LayerBand {
  index: number
  // Z of the first move that entered the band
  height: number
}

export interface BandLocation {
  band: LayerBand
  entered: boolean
  created: boolean
}

// Группировка ходов по слоям заданной высоты
export class LayerTracker {
  private bands = new Map<number, LayerBand>()
  private current: LayerBand | null = null

  constructor(private readonly layerHeight: number) {
    if (!(layerHeight > 0)) {
      throw new RangeError(`Layer height must be positive, got ${layerHeight}`)
    }
  }

  static indexOf(z: number, layerHeight: number): number {
    // + 0 turns -0 into 0
    return Math.round(z / layerHeight) + 0
  }

  /**
   * A printing move stays in the current band while its Z is within half a
   * layer of the band height; otherwise it enters the band of its own layer
   * index. Travel moves (Z-hops, layer changes before the first extrusion)
   * never open a band: they belong to the layer being printed.
   */
  locate(z: number, printing: boolean = true): BandLocation {
    if (this.current && (!printing || Math.abs(z - this.current.height) < this.layerHeight / 2)) {
      return { band: this.current, entered: false, created: false }
    }

    const index = LayerTracker.indexOf(z, this.layerHeight)
    const existing = this.bands.get(index)
    const band = existing ?? { index, height: z }
    if (!existing) {
      this.bands.set(index, band)
    }

    this.current = band
    return { band, entered: true, created: !existing }
  }

  get count(): number {
    return this.bands.size
  }
}
