import { PipelineError, PermanentPipelineError, toErrorInfo, fromErrorInfo } from '../src/errors';

describe('pipeline errors', () => {
    it('treats pipeline errors as retryable unless told otherwise', () => {
        expect(new PipelineError('rate limited').retryable).toBe(true);
        expect(new PipelineError('bad input', { retryable: false }).retryable).toBe(false);
        expect(new PermanentPipelineError('corrupt pdf').retryable).toBe(false);
    });

    it('flattens errors to plain info', () => {
        expect(toErrorInfo(new PermanentPipelineError('corrupt pdf'))).toEqual({
            message: 'corrupt pdf',
            name: 'PermanentPipelineError',
            retryable: false,
        });
        expect(toErrorInfo(new TypeError('boom'))).toEqual({ message: 'boom', name: 'TypeError', retryable: true });
        expect(toErrorInfo('plain string')).toEqual({ message: 'plain string', name: 'Error', retryable: true });
    });

    it('rebuilds a pipeline error from info', () => {
        const permanent = fromErrorInfo({ message: 'corrupt pdf', name: 'PermanentPipelineError', retryable: false });
        expect(permanent).toBeInstanceOf(PermanentPipelineError);
        expect(permanent.retryable).toBe(false);

        const transient = fromErrorInfo({ message: 'socket hang up', name: 'Error', retryable: true });
        expect(transient).toBeInstanceOf(PipelineError);
        expect(transient).not.toBeInstanceOf(PermanentPipelineError);
        expect(transient.name).toBe('Error');
        expect(transient.message).toBe('socket hang up');
    });
});
