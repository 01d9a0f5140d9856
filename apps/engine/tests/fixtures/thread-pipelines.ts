import { PermanentPipelineError, PipelineError, pipeline } from '@ingestq/sdk';

// Loaded inside the pipeline thread through INGEST_PIPELINES.
// File ids steer the outcome: "denied:x", "throttled:x" and "broken:x" fail.
pipeline('file_ingestion', async ({ payload, attempt, reportProgress }) => {
    const totalFiles = payload.files.length;

    payload.files.forEach((fileId, fileIndex) => {
        reportProgress({ stage: 'file_processing', fileIndex, totalFiles, currentFile: fileId });

        const [kind, name] = fileId.split(':');
        if (kind === 'denied') throw new PermanentPipelineError(`Access to ${name} denied`);
        if (kind === 'throttled') throw new PipelineError(`Embedding API throttled on ${name}`);
        if (kind === 'broken') throw new Error(`Cannot read ${name}`);

        reportProgress({ stage: 'storage', fileIndex, totalFiles, stageProgress: 1, processedFiles: fileIndex + 1 });
    });

    return { processedFiles: totalFiles, totalFiles, metadata: { attempt } };
});
