import { calculateBackOff, retryDelay } from '../../src/utils/backoff';

describe('calculateBackOff', () => {
    it('returns ~1000ms for attempt 1 (default)', () => {
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
    });

    it('returns ~4000ms for attempt 2 (default base 4)', () => {
        const delay = calculateBackOff(2);
        expect(delay).toBeGreaterThanOrEqual(3600);
        expect(delay).toBeLessThanOrEqual(4400);
    });

    it('caps at maxInterval', () => {
        const delay = calculateBackOff(10, 1000, 4, 5000);
        expect(delay).toBeGreaterThanOrEqual(4500); // 5000 ± 10% jitter
        expect(delay).toBeLessThanOrEqual(5500);
    });
});

describe('retryDelay', () => {
    const backoff = { initialIntervalMs: 5000, multiplier: 4, maxIntervalMs: 60000 };

    it('starts at the initial interval for the first retry', () => {
        const delay = retryDelay(1, backoff);
        expect(delay).toBeGreaterThanOrEqual(4500);
        expect(delay).toBeLessThanOrEqual(5500);
    });

    it('grows by the multiplier up to the cap', () => {
        const second = retryDelay(2, backoff);
        expect(second).toBeGreaterThanOrEqual(18000);
        expect(second).toBeLessThanOrEqual(22000);

        const capped = retryDelay(5, backoff);
        expect(capped).toBeGreaterThanOrEqual(54000);
        expect(capped).toBeLessThanOrEqual(66000);
    });

    it('is zero when back-off is disabled', () => {
        expect(retryDelay(3, { ...backoff, initialIntervalMs: 0 })).toBe(0);
    });
});
