/**
 * # Diagram Characters
 *
 * Every glyph the step diagram draws. A step renders as a box with its input
 * header on top and its output header below; connector trunks run vertically
 * from each port column to the labels naming the remote step and port:
 *
 * ```
 *       +       1-freepdk
 *       +       adk
 *       |
 *       V
 * -------------
 * |    adk    |
 * -------------
 * ```
 */

export const DIAGRAM_CHARS = {
  /** Field separator in header rows */
  BAR: '|',
  /** Box border fill */
  BORDER: '-',
  /** Port marker in arrow rows, pointing down */
  ARROW: 'V',
  /** Continuing trunk */
  TRUNK: '|',
  /** Trunk line that carries a label */
  BRANCH: '+',
  BLANK: ' ',
} as const;

export const LISTING_TITLES = {
  PARAMETERS: 'Parameters',
  FLAGS: 'Flags',
  SOURCE: 'Source',
} as const;

/** Boolean record keys printed in the flags section, in print order */
export const RECOGNIZED_FLAGS = ['sandbox'] as const;

export type RecognizedFlag = (typeof RECOGNIZED_FLAGS)[number];
