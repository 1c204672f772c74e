/**
 * A range [min, max] of ray parameters. The default interval is empty
 * (min = +∞, max = -∞), so it contains nothing and has negative size.
 */
export class Interval {
    min: number;
    max: number;

    static readonly empty = new Interval(Infinity, -Infinity);
    static readonly universe = new Interval(-Infinity, Infinity);

    constructor(min: number = Infinity, max: number = -Infinity) {
        this.min = min;
        this.max = max;
    }

    size(): number {
        return this.max - this.min;
    }

    /** Closed test: min <= x <= max. */
    contains(x: number): boolean {
        return this.min <= x && x <= this.max;
    }

    /** Open test: min < x < max. */
    surrounds(x: number): boolean {
        return this.min < x && x < this.max;
    }

    clamp(x: number): number {
        if (x < this.min) return this.min;
        if (x > this.max) return this.max;
        return x;
    }
}
