/**
 * Node Editor Host
 *
 * EditorHost backed by the local filesystem. The embedding program decides
 * where messages go and when a buffer counts as entered.
 */

import { EventEmitter } from 'events';
import { stat, unlink } from 'fs/promises';
import { isNotFoundError } from '@swapjump/core';
import type { BufferEnterListener, EditorHost } from './types.js';

const BUFFER_ENTER = 'buffer-enter';

export interface NodeEditorHostOptions {
  /** Receives status messages. Defaults to a line on stderr. */
  output?: (message: string) => void;
}

export class NodeEditorHost implements EditorHost {
  private emitter = new EventEmitter();
  private output: (message: string) => void;

  constructor(options: NodeEditorHostOptions = {}) {
    this.output = options.output ?? ((message) => process.stderr.write(`${message}\n`));
  }

  async getModifiedTime(path: string): Promise<number | null> {
    try {
      const stats = await stat(path);
      return stats.mtimeMs;
    } catch (err) {
      if (isNotFoundError(err)) {
        return null;
      }
      throw err;
    }
  }

  async deleteFile(path: string): Promise<void> {
    await unlink(path);
  }

  showMessage(message: string): void {
    this.output(message);
  }

  onBufferEnter(listener: BufferEnterListener): () => void {
    this.emitter.on(BUFFER_ENTER, listener);
    return () => {
      this.emitter.off(BUFFER_ENTER, listener);
    };
  }

  /**
   * Signal that the editor has switched into the resulting buffer.
   */
  enterBuffer(): void {
    this.emitter.emit(BUFFER_ENTER);
  }

  listenerCount(): number {
    return this.emitter.listenerCount(BUFFER_ENTER);
  }
}
