/** Index of the largest value; the first one wins on ties. */
export function argmax(values: ArrayLike<number>): number {
  if (values.length === 0) {
    throw new Error('Cannot take argmax of an empty vector');
  }

  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

/** Index of the smallest value; the first one wins on ties. */
export function argmin(values: ArrayLike<number>): number {
  if (values.length === 0) {
    throw new Error('Cannot take argmin of an empty vector');
  }

  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] < values[best]) {
      best = i;
    }
  }
  return best;
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Pairs every label with the value at the same index, keeping label order.
 */
export function toLabelMap(labels: readonly string[], values: ArrayLike<number>): Record<string, number> {
  if (labels.length !== values.length) {
    throw new Error(`Expected ${labels.length} values, got ${values.length}`);
  }

  const mapped: Record<string, number> = {};
  labels.forEach((label, index) => {
    mapped[label] = values[index];
  });
  return mapped;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
