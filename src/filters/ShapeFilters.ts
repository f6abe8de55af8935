import bboxPolygon from "@turf/bbox-polygon";
import booleanIntersects from "@turf/boolean-intersects";
import { Action } from "../adiff/ChangeContainer";
import {
  OSMGeometry,
  isEmptyGeometry,
  objectGeometry,
} from "../osm/OSMGeometry";
import { OSMObject, OSMType } from "../osm/OSMObject";
import ChangeFilter from "./ChangeFilter";

export type WatchedShape = GeoJSON.Polygon | GeoJSON.MultiPolygon;

/**
 * Triggers on changes where the new object, or the old one if the new one has
 * no geometry, intersects the given shape.
 *
 * Relations are never matched since their geometry isn't derived. Changes
 * where old and new share a changeset are skipped: that is typically a way
 * whose geometry moved only because its nodes moved, and the node changes
 * already report the changeset.
 */
export class ChangeInShapeFilter implements ChangeFilter {
  constructor(
    readonly shape: WatchedShape,
    readonly name?: string,
  ) {}

  explanation(): string {
    return this.name ? `Change in shape "${this.name}"` : "Change in shape";
  }

  matches(action: Action): boolean {
    const { old, new: newObject } = action;

    if (
      old?.type === OSMType.Relation ||
      newObject?.type === OSMType.Relation
    ) {
      return false;
    }

    if (
      old &&
      newObject &&
      old.changeset !== undefined &&
      old.changeset === newObject.changeset
    ) {
      return false;
    }

    const geometry = visibleGeometry(newObject) ?? visibleGeometry(old);
    return geometry !== null && booleanIntersects(geometry, this.shape);
  }
}

/**
 * Bounding box as minlon, minlat, maxlon, maxlat.
 */
export class ChangeInBoundingBoxFilter extends ChangeInShapeFilter {
  constructor(bbox: GeoJSON.BBox, name?: string) {
    super(bboxPolygon(bbox).geometry, name ?? `bbox ${bbox.join(",")}`);
  }
}

function visibleGeometry(object: OSMObject | undefined): OSMGeometry | null {
  if (!object || !object.visible) {
    return null;
  }
  const geometry = objectGeometry(object);
  return geometry && !isEmptyGeometry(geometry) ? geometry : null;
}
