export const enum ApplyMethod {
    Verify = 0,
    Temporary = 1,
    Persistent = 2
}
