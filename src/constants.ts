export const DEFAULT_DEPTH_ALERT = 64; // splay descents deeper than this raise an alert

export const DOT_BACKGROUND = "lightblue";
export const DOT_NODE_SHAPE =
  "shape=box;color=black;fontcolor=black;style=filled;fillcolor=white";
export const DOT_PHANTOM_PREFIX = "phantom";

export const DEFAULT_DOT_FILE_NUMBER = 1000;

export enum Direction {
  Left = "left",
  Right = "right",
}
