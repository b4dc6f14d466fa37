import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Fragment } from './colorize.js';

/** Never emits escape codes. */
export const plainPainter = new Chalk({ level: 0 });

/** Always emits 16-colour escape codes, whatever the output stream supports. */
export const ansiPainter = new Chalk({ level: 1 });

export const paintFragment = (fragment: Fragment, painter: ChalkInstance = chalk): string =>
  fragment
    .map(({ text, color, background }) => {
      let style = painter;
      if (color) {
        style = style[color];
      }
      if (background) {
        style = style[background];
      }
      return style(text);
    })
    .join('');
