export interface VennLayout {
  radiusA: number;
  radiusB: number;
  distance: number;
}

/** Area shared by two circles whose centres are `distance` apart. */
export function lensArea(radiusA: number, radiusB: number, distance: number): number {
  if (distance >= radiusA + radiusB) {
    return 0;
  }
  const inner = Math.min(radiusA, radiusB);
  if (distance <= Math.abs(radiusA - radiusB)) {
    return Math.PI * inner * inner;
  }

  const a2 = radiusA * radiusA;
  const b2 = radiusB * radiusB;
  const d2 = distance * distance;
  const alpha = Math.acos((d2 + a2 - b2) / (2 * distance * radiusA));
  const beta = Math.acos((d2 + b2 - a2) / (2 * distance * radiusB));
  const kite = Math.sqrt(
    (-distance + radiusA + radiusB) * (distance + radiusA - radiusB) * (distance - radiusA + radiusB) * (distance + radiusA + radiusB)
  );
  return a2 * alpha + b2 * beta - kite / 2;
}

/**
 * Circle areas proportional to the two set sizes and a centre distance whose
 * lens area is proportional to the intersection. The larger set gets `maxRadius`.
 */
export function layoutVenn(totalA: number, totalB: number, both: number, maxRadius: number, gap = 0): VennLayout {
  const largest = Math.max(totalA, totalB);
  if (largest === 0) {
    return { radiusA: maxRadius, radiusB: maxRadius, distance: 2 * maxRadius + gap };
  }

  const radiusA = maxRadius * Math.sqrt(totalA / largest);
  const radiusB = maxRadius * Math.sqrt(totalB / largest);
  const shared = Math.min(both, totalA, totalB);

  if (shared <= 0) {
    return { radiusA, radiusB, distance: radiusA + radiusB + gap };
  }
  if (shared === Math.min(totalA, totalB)) {
    return { radiusA, radiusB, distance: Math.abs(radiusA - radiusB) };
  }

  const target = Math.PI * maxRadius * maxRadius * (shared / largest);
  let near = Math.abs(radiusA - radiusB);
  let far = radiusA + radiusB;
  // the lens shrinks as the centres move apart
  for (let step = 0; step < 60; step += 1) {
    const middle = (near + far) / 2;
    if (lensArea(radiusA, radiusB, middle) > target) {
      near = middle;
    } else {
      far = middle;
    }
  }
  return { radiusA, radiusB, distance: (near + far) / 2 };
}
