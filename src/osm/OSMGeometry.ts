import { NodeRef, OSMNode, OSMObject, OSMType, OSMWay } from "./OSMObject";

export type OSMGeometry = GeoJSON.Point | GeoJSON.LineString | GeoJSON.Polygon;

/**
 * Derives the GeoJSON geometry of a node or way.
 *
 * Returns null when the diff elided the coordinates needed to build one.
 * Relations are not supported and always return null; callers that care
 * about the difference should check the type first.
 */
export function objectGeometry(object: OSMObject): OSMGeometry | null {
  switch (object.type) {
    case OSMType.Node:
      return nodeGeometry(object);
    case OSMType.Way:
      return wayGeometry(object);
    case OSMType.Relation:
      return null;
  }
}

export function nodeGeometry(node: OSMNode): GeoJSON.Point | null {
  if (node.lat === undefined || node.lon === undefined) {
    return null;
  }
  return { type: "Point", coordinates: [node.lon, node.lat] };
}

export function wayGeometry(
  way: OSMWay,
): GeoJSON.Point | GeoJSON.LineString | GeoJSON.Polygon | null {
  if (way.nodes.length === 0) {
    // Deleted ways can come through as a bare ID with no node list.
    return { type: "Polygon", coordinates: [] };
  }

  const positions: GeoJSON.Position[] = [];
  for (const node of way.nodes) {
    const position = nodeRefPosition(node);
    if (position === null) {
      return null;
    }
    positions.push(position);
  }

  if (positions.length === 1) {
    return { type: "Point", coordinates: positions[0] };
  }

  // A linear ring needs at least four positions.
  const first = way.nodes[0];
  const last = way.nodes[way.nodes.length - 1];
  if (first.ref === last.ref && positions.length >= 4) {
    return { type: "Polygon", coordinates: [positions] };
  }
  return { type: "LineString", coordinates: positions };
}

export function isEmptyGeometry(geometry: OSMGeometry): boolean {
  return geometry.coordinates.length === 0;
}

function nodeRefPosition(node: NodeRef): GeoJSON.Position | null {
  if (node.lat === undefined || node.lon === undefined) {
    return null;
  }
  return [node.lon, node.lat];
}
