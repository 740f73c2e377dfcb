// App - owns the grid state and runs the draw/read/update loop
// Drawing and state changes only ever happen in the loop body, one after the other

import type { AppConfig } from './config.js';
import type { DebugLog } from './debug-log.js';
import { type AppState, applyAction, createInitialState, selectedValue } from './state.js';
import { describeKey, keyToAction } from './tui/keys.js';
import { createTableColors, type TableColors } from './tui/palettes.js';
import { drawFrame, type FrameMode } from './tui/render.js';
import type { Surface } from './tui/surface.js';
import type { Terminal } from './tui/terminal.js';

export class App {
  readonly state: AppState;
  private readonly config: AppConfig;
  private readonly colors: TableColors;
  private readonly log: DebugLog;
  private lastMode: FrameMode | null = null;

  constructor(config: AppConfig, log: DebugLog, state: AppState = createInitialState()) {
    this.config = config;
    this.log = log;
    this.state = state;
    this.colors = createTableColors(config.palette);
  }

  /**
   * Runs until a quit key is pressed. Input failures reject and end the loop.
   */
  async run(terminal: Terminal): Promise<void> {
    this.log.log('system', 'Loop started', { palette: this.config.palette, cursor: { ...this.state.cursor } });

    for (;;) {
      terminal.draw((surface) => this.draw(surface));

      const event = await terminal.readEvent();
      if (event.type === 'resize') {
        this.log.log('render', `Resized to ${event.width}x${event.height}`);
        continue;
      }

      const action = keyToAction(event);
      switch (action.type) {
        case 'quit':
          this.log.log('input', `Quit (${describeKey(event)})`);
          return;
        case 'move':
          applyAction(this.state, action.action);
          this.log.log(
            'cursor',
            `${describeKey(event)} -> ${action.action} (${this.state.cursor.row}, ${this.state.cursor.column}) = ${selectedValue(this.state)}`,
          );
          break;
        case 'none':
          break;
      }
    }
  }

  /**
   * Draws the current state. Logs when the frame switches between the table
   * and the too-small warning.
   */
  draw(surface: Surface): void {
    const mode = drawFrame(surface, { state: this.state, colors: this.colors, title: this.config.title });
    if (mode !== this.lastMode) {
      const { width, height } = surface.area;
      this.log.log('render', `Showing ${mode === 'table' ? 'table' : 'size warning'} at ${width}x${height}`);
      this.lastMode = mode;
    }
  }
}
