/**
 * Names of the two per-identifier sub-folders, as configured.
 */
export interface SubdirNames {
    homepage: string;
    individualGate: string;
}

export interface SlotPaths {
    homepage: string;
    individualGate: string;
}
