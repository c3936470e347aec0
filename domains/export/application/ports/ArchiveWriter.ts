/**
* A single open export container.
*
* Entries are buffered until `finalize` seals the container; after that no
* further writes are accepted.
*/
export interface ArchiveWriter {
  readonly path: string;
  readonly filename: string;

  addEntry(name: string, content: string): void;

  /** Entry names in write order */
  entryNames(): string[];

  /**
  * Seal the container and release the file.
  * @throws {ExportWriteError} The partial file is removed first
  */
  finalize(): Promise<void>;

  /** Release the file and remove it. Safe to call more than once. */
  abort(): Promise<void>;
}

/**
* Opens a fresh, uniquely named container
*/
export interface ArchiveFactory {
  /**
  * @param now - Clock reading the filename is derived from
  * @throws {ExportInitError} The container could not be created
  */
  create(now: Date): Promise<ArchiveWriter>;
}
