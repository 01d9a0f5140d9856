export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface WaitOptions {
    timeoutMs?: number;
    intervalMs?: number;
    /** Included in the timeout error */
    what?: string;
}

/** Polls `predicate` until it holds, failing the test once the deadline passes. */
export async function waitUntil(
    predicate: () => Promise<boolean> | boolean,
    { timeoutMs = 2000, intervalMs = 10, what = 'condition' }: WaitOptions = {},
): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
        if (await predicate()) return;
        await sleep(intervalMs);
    }
    throw new Error(`Timed out after ${timeoutMs}ms waiting for ${what}`);
}
