/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { HashToolPort, HashToolOutput } from './hash-tool.port';
export type { OutputFileStoragePort, CreateOutputFileOptions } from './output-file-storage.port';
export type { TaskResultCodecPort, BatchResult } from './task-result-codec.port';
export type { MessageQueuePort, QueueMessage } from './message-queue.port';

// Injection tokens (string symbols for DI)
export const HASH_TOOL_PORT = 'HashToolPort';
export const OUTPUT_FILE_STORAGE_PORT = 'OutputFileStoragePort';
export const TASK_RESULT_CODEC_PORT = 'TaskResultCodecPort';
export const MESSAGE_QUEUE_PORT = 'MessageQueuePort';
