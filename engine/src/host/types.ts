/**
 * Editor host boundary
 *
 * What swapjump needs from the editor it runs for.
 */

export type BufferEnterListener = () => void;

export interface EditorHost {
  /** Modification time in milliseconds, or null if the path does not exist. */
  getModifiedTime(path: string): Promise<number | null>;
  deleteFile(path: string): Promise<void>;
  /** Write a transient message to the status area. */
  showMessage(message: string): void;
  /** Subscribe to "the editor switched into a buffer". Returns the unsubscribe function. */
  onBufferEnter(listener: BufferEnterListener): () => void;
}
