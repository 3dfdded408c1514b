/**
 * Seedable random sources for the built-in model generators.
 */
import seedrandom from "seedrandom";

export interface RandomSource {
    /** Uniform draw in [min, max). */
    uniform(min: number, max: number): number;
    gaussian(mean: number, stdDev: number): number;
    /** Gamma draw with the given shape (k) and scale (theta). */
    gamma(shape: number, scale: number): number;
    /** Restart the stream from `seed`. */
    reseed(seed: number | string): void;
}

/** An unseeded source is auto-seeded from ambient entropy. */
export function createRandom(seed?: number | string): RandomSource {
    let prng = seedrandom(seed === undefined ? undefined : String(seed));

    const gaussian = (mean: number, stdDev: number): number => {
        // Box-Muller
        const u1 = Math.max(1e-12, prng());
        const u2 = prng();
        return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    };

    const gamma = (shape: number, scale: number): number => {
        // Marsaglia-Tsang; shapes below 1 are boosted and corrected.
        if (shape < 1) {
            const u = Math.max(1e-12, prng());
            return gamma(shape + 1, scale) * Math.pow(u, 1 / shape);
        }
        const d = shape - 1 / 3;
        const c = 1 / Math.sqrt(9 * d);
        for (;;) {
            let x: number;
            let v: number;
            do {
                x = gaussian(0, 1);
                v = 1 + c * x;
            } while (v <= 0);
            v = v * v * v;
            const u = prng();
            if (u < 1 - 0.0331 * x * x * x * x) return d * v * scale;
            if (Math.log(Math.max(u, 1e-300)) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v * scale;
        }
    };

    return {
        uniform: (min, max) => min + (max - min) * prng(),
        gaussian,
        gamma,
        reseed: (next) => {
            prng = seedrandom(String(next));
        },
    };
}
