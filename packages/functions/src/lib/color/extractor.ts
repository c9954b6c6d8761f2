import sharp from "sharp";
import type { DominantColor, RGB } from "outfit-harmony-shared";

const DEFAULT_MAX_SIDE = 256;

/** Packed RGB bytes, row-major, three per pixel */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

export interface ClusteringOptions {
  /** Independent k-means++ restarts; the lowest-inertia run is kept */
  nInit?: number;
  maxIterations?: number;
  /** Stop once the summed squared centroid shift falls to this value */
  tolerance?: number;
  seed?: number;
}

export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageDecodeError";
  }
}

interface WeightedPoints {
  /** x, y, z per distinct color */
  values: Float64Array;
  weights: Float64Array;
  count: number;
  totalWeight: number;
}

interface ClusteringRun {
  centroids: Float64Array;
  labels: Int32Array;
  inertia: number;
}

/** mulberry32; small, fast and reproducible across platforms. */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function collapsePixels(image: PixelBuffer): WeightedPoints {
  const counts = new Map<number, number>();
  const { data } = image;
  for (let i = 0; i < data.length; i += 3) {
    const key = (data[i] << 16) | (data[i + 1] << 8) | data[i + 2];
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const values = new Float64Array(counts.size * 3);
  const weights = new Float64Array(counts.size);
  let index = 0;
  for (const [key, count] of counts) {
    values[index * 3] = (key >> 16) & 0xff;
    values[index * 3 + 1] = (key >> 8) & 0xff;
    values[index * 3 + 2] = key & 0xff;
    weights[index] = count;
    index++;
  }

  return { values, weights, count: counts.size, totalWeight: data.length / 3 };
}

function squaredDistance(a: Float64Array, ai: number, b: Float64Array, bi: number): number {
  const dx = a[ai * 3] - b[bi * 3];
  const dy = a[ai * 3 + 1] - b[bi * 3 + 1];
  const dz = a[ai * 3 + 2] - b[bi * 3 + 2];
  return dx * dx + dy * dy + dz * dz;
}

function pickIndex(count: number, weightAt: (index: number) => number, total: number, random: () => number): number {
  const target = random() * total;
  let cumulative = 0;
  for (let i = 0; i < count; i++) {
    cumulative += weightAt(i);
    if (cumulative > target) {
      return i;
    }
  }
  return count - 1;
}

function seedCentroids(points: WeightedPoints, k: number, random: () => number): Float64Array {
  const centroids = new Float64Array(k * 3);
  const nearest = new Float64Array(points.count);

  const place = (slot: number, pointIndex: number) => {
    centroids.set(points.values.subarray(pointIndex * 3, pointIndex * 3 + 3), slot * 3);
  };

  place(0, pickIndex(points.count, (i) => points.weights[i], points.totalWeight, random));
  for (let i = 0; i < points.count; i++) {
    nearest[i] = squaredDistance(points.values, i, centroids, 0);
  }

  for (let slot = 1; slot < k; slot++) {
    let potential = 0;
    for (let i = 0; i < points.count; i++) {
      potential += points.weights[i] * nearest[i];
    }

    // Every distinct color already has a centroid on it: the extra slot
    // duplicates one and ends up empty.
    const chosen =
      potential > 0
        ? pickIndex(points.count, (i) => points.weights[i] * nearest[i], potential, random)
        : pickIndex(points.count, (i) => points.weights[i], points.totalWeight, random);
    place(slot, chosen);

    for (let i = 0; i < points.count; i++) {
      nearest[i] = Math.min(nearest[i], squaredDistance(points.values, i, centroids, slot));
    }
  }

  return centroids;
}

/** Nearest centroid per point, ties to the lowest index. Returns inertia. */
function assign(points: WeightedPoints, centroids: Float64Array, k: number, labels: Int32Array): number {
  let inertia = 0;
  for (let i = 0; i < points.count; i++) {
    let best = 0;
    let bestDistance = squaredDistance(points.values, i, centroids, 0);
    for (let c = 1; c < k; c++) {
      const distance = squaredDistance(points.values, i, centroids, c);
      if (distance < bestDistance) {
        best = c;
        bestDistance = distance;
      }
    }
    labels[i] = best;
    inertia += bestDistance * points.weights[i];
  }
  return inertia;
}

function runLloyd(
  points: WeightedPoints,
  k: number,
  random: () => number,
  maxIterations: number,
  tolerance: number
): ClusteringRun {
  const centroids = seedCentroids(points, k, random);
  const labels = new Int32Array(points.count);

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    assign(points, centroids, k, labels);

    const sums = new Float64Array(k * 3);
    const clusterWeights = new Float64Array(k);
    for (let i = 0; i < points.count; i++) {
      const label = labels[i];
      const weight = points.weights[i];
      sums[label * 3] += points.values[i * 3] * weight;
      sums[label * 3 + 1] += points.values[i * 3 + 1] * weight;
      sums[label * 3 + 2] += points.values[i * 3 + 2] * weight;
      clusterWeights[label] += weight;
    }

    let shift = 0;
    for (let c = 0; c < k; c++) {
      // An empty cluster keeps its previous centroid.
      if (clusterWeights[c] === 0) continue;
      for (let axis = 0; axis < 3; axis++) {
        const next = sums[c * 3 + axis] / clusterWeights[c];
        shift += (next - centroids[c * 3 + axis]) ** 2;
        centroids[c * 3 + axis] = next;
      }
    }

    if (shift <= tolerance) {
      break;
    }
  }

  const inertia = assign(points, centroids, k, labels);
  return { centroids, labels, inertia };
}

/**
 * Cluster an image's pixels into at most `k` dominant colors.
 *
 * Runs seeded k-means++ `nInit` times and keeps the run with the lowest
 * inertia, so identical input always yields identical output. Centroids are
 * truncated to integers. Empty clusters are dropped and clusters whose
 * integer centroids coincide are merged, which means fewer than `k` entries
 * come back when the image has fewer than `k` distinct colors.
 */
export function extractDominantColors(
  image: PixelBuffer,
  k = 3,
  options: ClusteringOptions = {}
): DominantColor[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }

  const pixelCount = image.width * image.height;
  if (pixelCount <= 0 || image.data.length === 0) {
    throw new ImageDecodeError("Image contains no pixels");
  }
  if (image.data.length !== pixelCount * 3) {
    throw new ImageDecodeError(
      `Pixel buffer holds ${image.data.length} bytes, expected ${pixelCount * 3} for ${image.width}x${image.height} RGB`
    );
  }

  const nInit = options.nInit ?? 10;
  const maxIterations = options.maxIterations ?? 300;
  const tolerance = options.tolerance ?? 1e-4;
  const random = createRandom(options.seed ?? 42);

  const points = collapsePixels(image);
  let best: ClusteringRun | null = null;
  for (let run = 0; run < nInit; run++) {
    const candidate = runLloyd(points, k, random, maxIterations, tolerance);
    if (!best || candidate.inertia < best.inertia) {
      best = candidate;
    }
  }
  if (!best) {
    return [];
  }

  const clusterWeights = new Float64Array(k);
  for (let i = 0; i < points.count; i++) {
    clusterWeights[best.labels[i]] += points.weights[i];
  }

  const merged = new Map<string, { rgb: RGB; weight: number }>();
  for (let c = 0; c < k; c++) {
    if (clusterWeights[c] === 0) continue;
    const rgb: RGB = [
      Math.trunc(best.centroids[c * 3]),
      Math.trunc(best.centroids[c * 3 + 1]),
      Math.trunc(best.centroids[c * 3 + 2]),
    ];
    const key = rgb.join(",");
    const existing = merged.get(key);
    if (existing) {
      existing.weight += clusterWeights[c];
    } else {
      merged.set(key, { rgb, weight: clusterWeights[c] });
    }
  }

  return [...merged.values()]
    .map(({ rgb, weight }) => ({ rgb, percentage: (weight / points.totalWeight) * 100 }))
    .sort((a, b) => b.percentage - a.percentage);
}

/**
 * Decode an encoded image (JPEG, PNG, WebP, GIF, ...) into packed RGB.
 * EXIF orientation is applied, alpha is dropped and the longer side is
 * scaled down to `maxSide`.
 */
export async function decodeImage(bytes: Buffer, maxSide = DEFAULT_MAX_SIDE): Promise<PixelBuffer> {
  try {
    const { data, info } = await sharp(bytes)
      .rotate()
      .resize({ width: maxSide, height: maxSide, fit: "inside", withoutEnlargement: true })
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new ImageDecodeError(`Expected 3 channels after decoding, got ${info.channels}`);
    }
    return { width: info.width, height: info.height, data };
  } catch (error) {
    if (error instanceof ImageDecodeError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ImageDecodeError(`Unable to decode image: ${reason}`, { cause: error });
  }
}

export async function extractDominantColorsFromImage(
  bytes: Buffer,
  k = 3,
  maxSide = DEFAULT_MAX_SIDE
): Promise<DominantColor[]> {
  return extractDominantColors(await decodeImage(bytes, maxSide), k);
}
