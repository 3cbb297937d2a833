export type GeoPoint = {
  longitude: number;
  latitude: number;
};

export type LinearRing = GeoPoint[];

export type Polygon = {
  rings: LinearRing[];
};

/**
 * Parses a GML `posList` ("lat lon lat lon ...") into a single-ring polygon.
 * The ring is taken as given; closing it is left to the source data.
 */
export function polygonFromPosList(posList: string): Polygon | null {
  const tokens = posList.trim().split(/\s+/).filter(Boolean);
  if (!tokens.length || tokens.length % 2 !== 0) return null;

  const values = tokens.map(Number);
  if (values.some((value) => !Number.isFinite(value))) return null;

  const ring: LinearRing = [];
  for (let i = 0; i < values.length; i += 2) {
    ring.push({ latitude: values[i], longitude: values[i + 1] });
  }
  return { rings: [ring] };
}

export function polygonToWkt(polygon: Polygon): string {
  const rings = polygon.rings.map(
    (ring) => `(${ring.map((point) => `${point.longitude} ${point.latitude}`).join(", ")})`
  );
  return `POLYGON (${rings.join(", ")})`;
}
