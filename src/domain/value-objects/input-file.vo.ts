/**
 * Input file descriptor as it travels between pipeline stages.
 * Unknown keys are carried through untouched.
 */
export interface InputFileDescriptor {
  path?: string | null;
  display_name?: string | null;
  filename?: string | null;
  uuid?: string | null;
  [key: string]: unknown;
}

/**
 * Input File Value Object
 * Read-only view over a descriptor handed in by the previous stage
 */
export class InputFileVO {
  static readonly DEFAULT_DISPLAY_NAME = 'input_file';

  private constructor(private readonly descriptor: Readonly<InputFileDescriptor>) {}

  static from(descriptor: InputFileDescriptor): InputFileVO {
    return new InputFileVO({ ...descriptor });
  }

  /**
   * Filesystem path, or undefined when the entry has none (an empty string counts as none).
   */
  get path(): string | undefined {
    return this.descriptor.path || undefined;
  }

  get displayName(): string {
    return (
      this.descriptor.display_name || this.descriptor.filename || InputFileVO.DEFAULT_DISPLAY_NAME
    );
  }

  get uuid(): string | undefined {
    return this.descriptor.uuid || undefined;
  }

  hasPath(): boolean {
    return this.path !== undefined;
  }

  toJSON(): InputFileDescriptor {
    return { ...this.descriptor };
  }
}
