/**
 * Race a promise against a deadline.
 *
 * The timer is always cleared, so a settled operation never keeps the
 * event loop alive. `onTimeout` builds the rejection reason.
 */
export function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error
): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(onTimeout()), timeoutMs);

        operation.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}
