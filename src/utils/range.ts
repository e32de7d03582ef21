export interface Window {
  start: number; // inclusive
  length: number;
}

export const end = (window: Window): number => {
  return window.start + window.length; // exclusive
};

export const equals = (a: Window, b: Window): boolean => {
  return a.start === b.start && a.length === b.length;
};
export const touches = (a: Window, b: Window): boolean => {
  return end(a) === b.start || end(b) === a.start;
};
export const overlaps = (a: Window, b: Window): boolean => {
  return end(a) > b.start && end(b) > a.start;
};

export const toString = (window: Window): string => {
  return `[${window.start}, ${end(window)})`;
};
