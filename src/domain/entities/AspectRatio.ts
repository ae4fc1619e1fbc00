/**
 * Aspect ratios accepted by the FLUX Kontext edit endpoint, in lookup order.
 * Order matters: when two entries are equally close, the earlier one wins.
 */
export const SUPPORTED_ASPECT_RATIOS = [
    { label: '1:1', width: 1, height: 1 },
    { label: '4:3', width: 4, height: 3 },
    { label: '3:4', width: 3, height: 4 },
    { label: '16:9', width: 16, height: 9 },
    { label: '9:16', width: 9, height: 16 },
    { label: '21:9', width: 21, height: 9 },
    { label: '9:21', width: 9, height: 21 },
    { label: '3:2', width: 3, height: 2 },
    { label: '2:3', width: 2, height: 3 },
    { label: '7:3', width: 7, height: 3 },
    { label: '3:7', width: 3, height: 7 },
] as const;

export type AspectRatioLabel = typeof SUPPORTED_ASPECT_RATIOS[number]['label'];

export const DEFAULT_ASPECT_RATIO: AspectRatioLabel = '1:1';

export function isAspectRatioLabel(value: string): value is AspectRatioLabel {
    return SUPPORTED_ASPECT_RATIOS.some(ratio => ratio.label === value);
}

/**
 * Greatest common divisor (Euclid). gcd(0, n) is n.
 */
export function gcd(a: number, b: number): number {
    while (b) {
        [a, b] = [b, a % b];
    }
    return a;
}

/**
 * Maps pixel dimensions to the closest supported aspect ratio label.
 */
export function classifyAspectRatio(width: number, height: number): AspectRatioLabel {
    const divisor = gcd(width, height);
    const current = (width / divisor) / (height / divisor);

    let closest: AspectRatioLabel = DEFAULT_ASPECT_RATIO;
    let minDiff = Infinity;

    for (const ratio of SUPPORTED_ASPECT_RATIOS) {
        const diff = Math.abs(current - ratio.width / ratio.height);
        if (diff < minDiff) {
            minDiff = diff;
            closest = ratio.label;
        }
    }

    return closest;
}
