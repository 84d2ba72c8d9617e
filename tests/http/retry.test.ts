import { ExternalServiceError, NetworkError } from '../../src/domain/errors';
import { AttemptOutcome, classifyError, retryWithBackoff } from '../../src/http/retry';
import { TEST_RETRY_POLICY } from '../helpers';

describe('retryWithBackoff', () => {
    const wait = jest.fn<Promise<void>, [number]>();

    beforeEach(() => {
        wait.mockReset();
        wait.mockResolvedValue(undefined);
    });

    it('should return the first success without waiting', async () => {
        const attempt = jest.fn<Promise<AttemptOutcome<number>>, [number]>()
            .mockResolvedValue({ kind: 'success', value: 42 });

        const result = await retryWithBackoff('test', attempt, TEST_RETRY_POLICY, wait);

        expect(result).toEqual({ ok: true, value: 42, attempts: 1 });
        expect(wait).not.toHaveBeenCalled();
    });

    it('should back off 2s then 4s between retryable failures', async () => {
        const attempt = jest.fn<Promise<AttemptOutcome<number>>, [number]>()
            .mockResolvedValueOnce({ kind: 'retryable', reason: 'timeout' })
            .mockResolvedValueOnce({ kind: 'retryable', reason: 'timeout' })
            .mockResolvedValueOnce({ kind: 'success', value: 7 });

        const result = await retryWithBackoff('test', attempt, TEST_RETRY_POLICY, wait);

        expect(result).toEqual({ ok: true, value: 7, attempts: 3 });
        expect(wait.mock.calls).toEqual([[2000], [4000]]);
        expect(attempt.mock.calls).toEqual([[1], [2], [3]]);
    });

    it('should give up after the last attempt without a trailing wait', async () => {
        const attempt = jest.fn<Promise<AttemptOutcome<number>>, [number]>()
            .mockResolvedValue({ kind: 'retryable', reason: 'HTTP 503' });

        const result = await retryWithBackoff('test', attempt, TEST_RETRY_POLICY, wait);

        expect(result).toEqual({ ok: false, reason: 'HTTP 503', attempts: 3, error: undefined });
        expect(attempt).toHaveBeenCalledTimes(3);
        expect(wait).toHaveBeenCalledTimes(2);
        expect(console.warn).toHaveBeenCalledWith('[test] attempt 3/3 failed: HTTP 503');
    });

    it('should stop immediately on a terminal outcome', async () => {
        const attempt = jest.fn<Promise<AttemptOutcome<number>>, [number]>()
            .mockResolvedValue({ kind: 'terminal', reason: 'address not found' });

        const result = await retryWithBackoff('test', attempt, TEST_RETRY_POLICY, wait);

        expect(result).toEqual({ ok: false, reason: 'address not found', attempts: 1, error: undefined });
        expect(wait).not.toHaveBeenCalled();
    });
});

describe('classifyError', () => {
    it('should classify by the retryable flag', () => {
        const transient = new NetworkError('osrm', 'socket hang up');
        const permanent = new ExternalServiceError({ service: 'osrm', message: 'bad request', statusCode: 400 });

        expect(classifyError(transient)).toEqual({ kind: 'retryable', reason: 'socket hang up', error: transient });
        expect(classifyError(permanent)).toEqual({ kind: 'terminal', reason: 'bad request', error: permanent });
    });

    it('should rethrow anything that is not a FreightError', () => {
        expect(() => classifyError(new TypeError('bug'))).toThrow('bug');
    });
});
