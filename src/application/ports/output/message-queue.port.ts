/**
 * Message Queue Message
 */
export interface QueueMessage<T = unknown> {
  messageId: string;
  body: T;
  receiptHandle: string;
  approximateReceiveCount: number;
}

/**
 * Message Queue Port (Driven Port)
 * Interface for message queue operations (SQS)
 */
export interface MessageQueuePort {
  /**
   * Send a single message to a queue
   */
  sendMessage<T>(queueUrl: string, message: T): Promise<string>;

  /**
   * Receive messages from a queue
   */
  receiveMessages(queueUrl: string, maxMessages?: number): Promise<QueueMessage[]>;

  /**
   * Delete a message from the queue after processing
   */
  deleteMessage(queueUrl: string, receiptHandle: string): Promise<void>;
}
