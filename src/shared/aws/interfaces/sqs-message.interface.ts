export interface SqsMessageEnvelope<T = unknown> {
  body: T;
  receiptHandle: string;
  messageId: string;
  approximateReceiveCount: number;
}

export interface SqsSendResult {
  messageId: string;
  sequenceNumber?: string;
}
