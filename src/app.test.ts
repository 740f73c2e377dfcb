import { beforeEach, describe, expect, it } from 'vitest';
import { App } from './app.js';
import { createConfig } from './config.js';
import { DebugLog } from './debug-log.js';
import { InputReadError } from './errors.js';
import { selectedValue } from './state.js';
import { FrameBuffer } from './tui/buffer.js';
import { char, type InputEvent, named } from './tui/keys.js';
import { BufferSurface, type Surface } from './tui/surface.js';
import type { Terminal } from './tui/terminal.js';

/**
 * In-process terminal that replays a fixed list of events
 */
class ScriptedTerminal implements Terminal {
  readonly events: InputEvent[];
  frames: FrameBuffer[] = [];
  reads = 0;
  width: number;
  height: number;

  constructor(events: InputEvent[], width = 30, height = 10) {
    this.events = [...events];
    this.width = width;
    this.height = height;
  }

  draw(render: (surface: Surface) => void): void {
    const buffer = new FrameBuffer(this.width, this.height);
    render(new BufferSurface(buffer));
    this.frames.push(buffer);
  }

  readEvent(): Promise<InputEvent> {
    this.reads++;
    const event = this.events.shift();
    if (!event) {
      return Promise.reject(new InputReadError('Script ran out of events'));
    }
    if (event.type === 'resize') {
      this.width = event.width;
      this.height = event.height;
    }
    return Promise.resolve(event);
  }

  get lastFrame(): FrameBuffer {
    return this.frames[this.frames.length - 1];
  }
}

describe('App', () => {
  let app: App;

  beforeEach(() => {
    app = new App(createConfig({ debugLogPath: null }), new DebugLog(null));
  });

  it('should move Down, Down, Right to the cell holding 8', async () => {
    const terminal = new ScriptedTerminal([named('down'), named('down'), named('right'), char('q')]);

    await app.run(terminal);

    expect(app.state.cursor).toEqual({ row: 2, column: 1 });
    expect(selectedValue(app.state)).toBe('8');
    expect(terminal.frames).toHaveLength(4);

    // Row 2 is drawn on lines 7-9 with its values on line 8; column 1 is centered at x=14
    const cell = terminal.lastFrame.cell(14, 8);
    expect(cell?.symbol).toBe('8');
    expect(cell?.style).toEqual({ fg: '#2563eb', bg: '#020617', reversed: true });
  });

  it('should wrap around with WASD', async () => {
    const keys = ['s', 'd', 'd', 'd', 'w', 'w', 'a'].map((c) => char(c));
    const terminal = new ScriptedTerminal([...keys, char('q')]);

    await app.run(terminal);

    expect(app.state.cursor).toEqual({ row: 2, column: 2 });
    expect(selectedValue(app.state)).toBe('9');
  });

  const quitKeys: [string, InputEvent][] = [
    ['q', char('q')],
    ['Escape', named('escape')],
    ['Ctrl+C', char('c', true)],
  ];

  for (const [label, key] of quitKeys) {
    it(`should stop reading after ${label}`, async () => {
      const terminal = new ScriptedTerminal([named('right'), key, named('down')]);

      await expect(app.run(terminal)).resolves.toBeUndefined();

      expect(terminal.reads).toBe(2);
      expect(terminal.events).toEqual([named('down')]);
      expect(app.state.cursor).toEqual({ row: 0, column: 1 });
    });
  }

  it('should ignore unbound keys', async () => {
    const terminal = new ScriptedTerminal([char('x'), named('enter'), char('c'), char('q')]);

    await app.run(terminal);

    expect(app.state.cursor).toEqual({ row: 0, column: 0 });
    expect(terminal.frames).toHaveLength(4);
  });

  it('should redraw after a resize without moving the cursor', async () => {
    const terminal = new ScriptedTerminal([{ type: 'resize', width: 20, height: 8 }, char('q')]);

    await app.run(terminal);

    expect(app.state.cursor).toEqual({ row: 0, column: 0 });
    expect(terminal.frames).toHaveLength(2);
    expect(terminal.frames[0].lineText(0)).toBe(`${' '.repeat(10)}You VS Bot${' '.repeat(10)}`);
    expect(terminal.lastFrame.lineText(3)).toBe(' Terminal size too  ');
    expect(terminal.lastFrame.lineText(4)).toBe('       small.       ');
  });

  it('should keep moving while the terminal is too small', async () => {
    const terminal = new ScriptedTerminal([named('down'), char('q')], 20, 5);

    await app.run(terminal);

    expect(app.state.cursor).toEqual({ row: 1, column: 0 });
  });

  it('should propagate input failures', async () => {
    const terminal = new ScriptedTerminal([named('down')]);

    await expect(app.run(terminal)).rejects.toThrow(InputReadError);
    expect(app.state.cursor).toEqual({ row: 1, column: 0 });
  });

  it('should draw the title from the configuration', async () => {
    app = new App(createConfig({ title: 'Pick a cell', debugLogPath: null }), new DebugLog(null));
    const terminal = new ScriptedTerminal([char('q')]);

    await app.run(terminal);

    expect(terminal.lastFrame.lineText(0)).toBe(`${' '.repeat(9)}Pick a cell${' '.repeat(10)}`);
  });
});
