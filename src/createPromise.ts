import type { PromiseData } from "./PromiseData";

export function createPromise<T = void>(): PromiseData<T> {
    let resolve: ((value: T | PromiseLike<T>) => void) | undefined;
    let reject: ((reason: unknown) => void) | undefined;
    const promise = new Promise<T>((res: (value: T | PromiseLike<T>) => void, rej: (reason: unknown) => void) => {
        resolve = res;
        reject = rej;
    });
    if (!resolve || !reject) {
        throw new Error("Promise executor did not run synchronously");
    }
    return { resolve, reject, promise };
}
