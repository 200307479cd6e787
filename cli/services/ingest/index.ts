export * from './archive';
export * from './image-probe';
export * from './ingestion-pipeline';
export * from './storage-key';
