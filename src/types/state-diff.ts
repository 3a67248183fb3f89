// Every world-state mutation is an ordered list of these diffs.

export type TreeValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | TreeValue[]
  | TreeNode;

export type TreeNode = { [key: string]: TreeValue };

export type StateDiff =
  | { op: 'set'; path: string; value: TreeValue }
  | { op: 'remove'; path: string };
