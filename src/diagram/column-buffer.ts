import { DIAGRAM_CHARS } from '../constants.js';

/**
 * What a connector line shows in one port column.
 * - absent:  the port has no edges on this side
 * - pending: the port has edges but its trunk is not drawn on this line
 */
export type ColumnState = 'absent' | 'pending' | 'trunk' | 'branch' | 'arrow';

const STATE_CHARS: Record<ColumnState, string> = {
  absent: DIAGRAM_CHARS.BLANK,
  pending: DIAGRAM_CHARS.BLANK,
  trunk: DIAGRAM_CHARS.TRUNK,
  branch: DIAGRAM_CHARS.BRANCH,
  arrow: DIAGRAM_CHARS.ARROW,
};

/**
 * One state per port, each pinned to a fixed character column of a
 * `width`-wide line. Ports are addressed by index, never by searching the
 * rendered text.
 */
export class ColumnBuffer {
  private readonly states: ColumnState[];

  constructor(
    private readonly width: number,
    private readonly columns: readonly number[],
    initial: ColumnState = 'absent'
  ) {
    this.states = columns.map(() => initial);
  }

  get size(): number {
    return this.states.length;
  }

  get(port: number): ColumnState {
    return this.states[port];
  }

  set(port: number, state: ColumnState): this {
    if (port < 0 || port >= this.states.length) {
      throw new RangeError(`Port index ${port} out of range (0..${this.states.length - 1})`);
    }
    this.states[port] = state;
    return this;
  }

  render(): string {
    const cells = new Array<string>(this.width).fill(DIAGRAM_CHARS.BLANK);
    this.states.forEach((state, port) => {
      cells[this.columns[port]] = STATE_CHARS[state];
    });
    return cells.join('');
  }
}
