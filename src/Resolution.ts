export interface Resolution {
    width: number;
    height: number;
}
