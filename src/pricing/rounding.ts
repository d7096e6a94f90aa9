export function roundJpy(value: number): number {
    return Math.round(value);
}

export function roundUsd(value: number): number {
    return Math.round(value * 100) / 100;
}
