export type TagType = "bit" | "word" | "float";

export type RegisterArea = "D" | "M";

export type Tag = {
  label: string;
  register: string;
  area: RegisterArea;
  offset: number;
  type: TagType;
};

export type Device = {
  name: string;
  address: string;
  byteOrderSwapped: boolean;
  tags: readonly Tag[];
};

export type Sample = {
  timestamp: number;
  value: number | null;
};

export type FigurePoint = {
  t: number;
  v: number | null;
};

export type FigureLine = {
  device: string;
  color: string;
  points: FigurePoint[];
};

export type FigurePanel = {
  tag: string;
  lines: FigureLine[];
};

export type Figure = {
  title: string;
  t: number;
  window: { start: number | null; end: number | null; length: number };
  panels: FigurePanel[];
};
