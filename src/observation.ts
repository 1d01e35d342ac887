import type { Observation } from "./types.js";

export function createObservation(planes: number, height: number, width: number): Observation {
  return {
    shape: [planes, height, width],
    data: new Float32Array(planes * height * width),
  };
}

function offset(observation: Observation, plane: number, row: number, col: number): number {
  const [, height, width] = observation.shape;
  return (plane * height + row) * width + col;
}

export function markCell(observation: Observation, plane: number, row: number, col: number): void {
  observation.data[offset(observation, plane, row, col)] = 1;
}

export function valueAt(observation: Observation, plane: number, row: number, col: number): number {
  return observation.data[offset(observation, plane, row, col)] ?? 0;
}

export function observationSum(observation: Observation): number {
  let total = 0;
  for (const value of observation.data) {
    total += value;
  }
  return total;
}

/**
 * Fills planes from the placement field of a FEN-like string. Row 0 is the
 * first rank listed in the string.
 */
export function planesFromPlacement(
  placement: string,
  planeOf: Readonly<Record<string, number>>,
  observation: Observation,
): Observation {
  const ranks = placement.split("/");
  ranks.forEach((rank, row) => {
    let col = 0;
    for (const char of rank) {
      if (char >= "0" && char <= "9") {
        col += Number.parseInt(char, 10);
        continue;
      }
      const plane = planeOf[char];
      if (plane !== undefined) {
        markCell(observation, plane, row, col);
      }
      col += 1;
    }
  });
  return observation;
}
