/**
 * TextCommandEntry — state behind the typed-command surface.
 *
 * Rendering and focus belong to the host. This class only tracks whether
 * the entry is open, suppresses the host's movement input while it is,
 * and forwards submitted text into the same resolve-and-dispatch path
 * voice commands use.
 */

import type { InputSuppressor, PipelineResult } from './types.js';
import type { EventBus } from '../core/events.js';
import { getLogger, type Logger } from '../core/logger.js';

export interface CommandSink {
  submitText(text: string): Promise<PipelineResult>;
}

export interface TextCommandEntryOptions {
  suppressor?: InputSuppressor;
  events?: EventBus;
  logger?: Logger;
}

export class TextCommandEntry {
  private opened = false;
  private readonly logger: Logger;

  constructor(private readonly sink: CommandSink, private readonly options: TextCommandEntryOptions = {}) {
    this.logger = options.logger ?? getLogger();
  }

  isOpen(): boolean {
    return this.opened;
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.options.suppressor?.suppressInput(true);
    this.options.events?.emit('entry:opened', {});
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.options.suppressor?.suppressInput(false);
    this.options.events?.emit('entry:closed', {});
  }

  toggle(): boolean {
    if (this.opened) {
      this.close();
    } else {
      this.open();
    }
    return this.opened;
  }

  /**
   * Send the typed command and close the entry. Blank text is ignored and
   * leaves the entry open.
   */
  async submit(text: string): Promise<PipelineResult | null> {
    const command = text.trim();
    if (!command) return null;

    this.logger.debug({ command }, 'Sending typed command');
    this.close();
    return this.sink.submitText(command);
  }
}
