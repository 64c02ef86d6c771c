import { join } from 'path';

/**
 * Externalizable form of an output file, as listed in a batch result.
 */
export interface OutputFileDescriptor {
  uuid: string;
  display_name: string;
  extension: string;
  data_type: string;
  path: string;
}

export interface OutputFileProps {
  uuid: string;
  outputPath: string;
  displayName: string;
  extension: string;
  dataType: string;
}

/**
 * Output File Entity
 * One artifact allocated in the task's output directory. The file on disk is
 * named after the uuid; the display name keeps the human label.
 */
export class OutputFileEntity {
  private constructor(
    private readonly _uuid: string,
    private readonly _path: string,
    private readonly _displayName: string,
    private readonly _extension: string,
    private readonly _dataType: string,
  ) {}

  static create(props: OutputFileProps): OutputFileEntity {
    if (!props.uuid) {
      throw new Error('Output file uuid cannot be empty');
    }
    if (!props.outputPath) {
      throw new Error('Output path cannot be empty');
    }

    const extension = props.extension.replace(/^\.+/, '');
    const displayName = props.displayName || props.uuid;
    const filename = extension ? `${props.uuid}.${extension}` : props.uuid;

    return new OutputFileEntity(
      props.uuid,
      join(props.outputPath, filename),
      extension ? `${displayName}.${extension}` : displayName,
      extension,
      props.dataType,
    );
  }

  get uuid(): string {
    return this._uuid;
  }

  get path(): string {
    return this._path;
  }

  get displayName(): string {
    return this._displayName;
  }

  get extension(): string {
    return this._extension;
  }

  get dataType(): string {
    return this._dataType;
  }

  toDict(): OutputFileDescriptor {
    return {
      uuid: this._uuid,
      display_name: this._displayName,
      extension: this._extension,
      data_type: this._dataType,
      path: this._path,
    };
  }
}
