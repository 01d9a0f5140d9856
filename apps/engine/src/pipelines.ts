import { FailedFile, PermanentPipelineError, pipeline } from '@ingestq/sdk';

// Example pipeline for local dev: walks every file through the four stages
// without touching any real storage.

const CHUNKS_PER_FILE = 8;
const BATCH_SIZE = 4;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export const fileIngestion = pipeline('file_ingestion', async ({ payload, reportProgress, attempt }) => {
    const totalFiles = payload.files.length;
    const configuredDelay = payload.options?.delayMs;
    const delayMs = typeof configuredDelay === 'number' ? configuredDelay : 50;
    const failedFiles: FailedFile[] = [];
    let processedFiles = 0;

    for (const [fileIndex, fileId] of payload.files.entries()) {
        const base = { fileIndex, totalFiles, currentFile: fileId };

        reportProgress({ ...base, stage: 'file_processing', processedFiles, failedFiles: failedFiles.length });
        await sleep(delayMs);

        if (fileId.startsWith('corrupt:')) {
            failedFiles.push({ fileId, error: 'Unsupported file format' });
            continue;
        }
        if (fileId.startsWith('flaky:') && attempt === 1) {
            throw new Error(`Transient read failure for ${fileId}`);
        }
        if (fileId.startsWith('forbidden:')) {
            throw new PermanentPipelineError(`Access to ${fileId} denied`);
        }

        reportProgress({ ...base, stage: 'text_extraction', stageProgress: 0.5 });
        await sleep(delayMs);

        const totalBatches = Math.ceil(CHUNKS_PER_FILE / BATCH_SIZE);
        for (let batch = 1; batch <= totalBatches; batch++) {
            const currentChunk = Math.min(batch * BATCH_SIZE, CHUNKS_PER_FILE);
            reportProgress({
                ...base,
                stage: 'embedding',
                currentBatch: batch,
                totalBatches,
                currentChunk,
                totalChunks: CHUNKS_PER_FILE,
            });
            await sleep(delayMs);
        }

        reportProgress({ ...base, stage: 'storage', stageProgress: 1 });
        processedFiles++;
    }

    return {
        processedFiles,
        totalFiles,
        failedFiles,
        metadata: { chunks_stored: processedFiles * CHUNKS_PER_FILE },
    };
});
