/**
 * Message published to the results queue once a batch has been hashed.
 * `result` is the base64-encoded batch result read by the next stage.
 */
export interface SsdeepTaskResultMessage {
  taskId: string;
  taskName: string;
  workflowId: string | null;
  result: string;
}
