const PALETTE = [
  "#38bdf8",
  "#f59e0b",
  "#22c55e",
  "#a78bfa",
  "#f472b6",
  "#2dd4bf",
  "#fb7185",
  "#60a5fa",
  "#f97316",
  "#34d399",
];

export const FREE_UNIT_COLOR = "#ffffff";

export const EMPTY_FRAME_COLOR = "#27272a";

function paletteAt(index: number): string {
  const size = PALETTE.length;
  return PALETTE[((index % size) + size) % size] ?? PALETTE[0];
}

/** Allocation ids start at 1, so consecutive blocks never share a color. */
export function getAllocationColor(id: number | null): string {
  if (id === null) return FREE_UNIT_COLOR;
  return paletteAt(id - 1);
}

export function getPageColor(page: number | null): string {
  if (page === null) return EMPTY_FRAME_COLOR;
  return paletteAt(page);
}
