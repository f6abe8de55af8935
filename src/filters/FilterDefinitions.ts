import { readFile } from "fs/promises";
import { UserInterest } from "../alerts/UserInterest";
import ChangeFilter from "./ChangeFilter";
import ObjectChangedFilter from "./ObjectChangedFilter";
import { ChangeInBoundingBoxFilter, ChangeInShapeFilter } from "./ShapeFilters";
import { ObjectWithTagChangedFilter, TagValueInListFilter } from "./TagFilters";
import {
  NewUserFilter,
  UserIDChangedFilter,
  UserIDMadeChangeFilter,
} from "./UserFilters";

export type FilterDefinition =
  | { type: "userIdChanged"; uid: number }
  | { type: "userIdMadeChange"; uid: number }
  | { type: "newUser"; seenUserIds?: number[] }
  | { type: "objectChanged"; objectType: string; id: number }
  | {
      type: "changeInBoundingBox";
      bbox: [number, number, number, number];
      name?: string;
    }
  | {
      type: "changeInShape";
      geometry: GeoJSON.Polygon | GeoJSON.MultiPolygon;
      name?: string;
    }
  | { type: "tagValueInList"; key: string; values: string[] }
  | { type: "objectWithTagChanged"; key: string; value: string };

export type UserInterests = {
  interests: UserInterest[];
  // Shared by every NewUserFilter built alongside it.
  seenUserIds: Set<number>;
};

type JSONObject = { [key: string]: unknown };

/**
 * Builds filter instances from a parsed interests file:
 * `[{ "userId": "...", "filters": [{ "type": "...", ... }] }]`.
 *
 * Throws on the first definition that doesn't describe a valid filter.
 */
export function buildUserInterests(
  json: unknown,
  seenUserIds: Set<number> = new Set(),
): UserInterests {
  if (!Array.isArray(json)) {
    throw new Error("User interests must be a JSON array");
  }

  const interests = json.map((entry, index): UserInterest => {
    const path = `interests[${index}]`;
    const object = expectObject(entry, path);
    const userId = expectString(object.userId, `${path}.userId`);
    const filters = object.filters;
    if (!Array.isArray(filters)) {
      throw new Error(`${path}.filters must be an array`);
    }
    return {
      userId,
      filters: filters.map((definition, filterIndex) =>
        buildFilter(
          parseFilterDefinition(definition, `${path}.filters[${filterIndex}]`),
          seenUserIds,
        ),
      ),
    };
  });

  return { interests, seenUserIds };
}

export async function loadUserInterests(
  path: string,
  seenUserIds?: Set<number>,
): Promise<UserInterests> {
  const contents = await readFile(path);
  return buildUserInterests(JSON.parse(contents.toString()), seenUserIds);
}

export function buildFilter(
  definition: FilterDefinition,
  seenUserIds: Set<number>,
): ChangeFilter {
  switch (definition.type) {
    case "userIdChanged":
      return new UserIDChangedFilter(definition.uid);
    case "userIdMadeChange":
      return new UserIDMadeChangeFilter(definition.uid);
    case "newUser":
      for (const uid of definition.seenUserIds ?? []) {
        seenUserIds.add(uid);
      }
      return new NewUserFilter(seenUserIds);
    case "objectChanged":
      return new ObjectChangedFilter(definition.objectType, definition.id);
    case "changeInBoundingBox":
      return new ChangeInBoundingBoxFilter(definition.bbox, definition.name);
    case "changeInShape":
      return new ChangeInShapeFilter(definition.geometry, definition.name);
    case "tagValueInList":
      return new TagValueInListFilter(definition.key, definition.values);
    case "objectWithTagChanged":
      return new ObjectWithTagChangedFilter(definition.key, definition.value);
  }
}

export function parseFilterDefinition(
  json: unknown,
  path: string,
): FilterDefinition {
  const object = expectObject(json, path);
  const type = expectString(object.type, `${path}.type`);

  switch (type) {
    case "userIdChanged":
    case "userIdMadeChange":
      return { type, uid: expectInteger(object.uid, `${path}.uid`) };
    case "newUser":
      return {
        type,
        seenUserIds: optionalIntegerArray(
          object.seenUserIds,
          `${path}.seenUserIds`,
        ),
      };
    case "objectChanged":
      return {
        type,
        objectType: expectString(object.objectType, `${path}.objectType`),
        id: expectInteger(object.id, `${path}.id`),
      };
    case "changeInBoundingBox":
      return {
        type,
        bbox: expectBBox(object.bbox, `${path}.bbox`),
        name: optionalString(object.name, `${path}.name`),
      };
    case "changeInShape":
      return {
        type,
        geometry: expectPolygonal(object.geometry, `${path}.geometry`),
        name: optionalString(object.name, `${path}.name`),
      };
    case "tagValueInList":
      return {
        type,
        key: expectString(object.key, `${path}.key`),
        values: expectStringArray(object.values, `${path}.values`),
      };
    case "objectWithTagChanged":
      return {
        type,
        key: expectString(object.key, `${path}.key`),
        value: expectString(object.value, `${path}.value`),
      };
    default:
      throw new Error(`${path}.type: unknown filter type "${type}"`);
  }
}

function expectObject(value: unknown, path: string): JSONObject {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`${path} must be an object`);
  }
  return { ...value };
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : expectString(value, path);
}

function expectInteger(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${path} must be an integer`);
  }
  return value;
}

function optionalIntegerArray(
  value: unknown,
  path: string,
): number[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`);
  }
  return value.map((item, index) => expectInteger(item, `${path}[${index}]`));
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${path} must be a number`);
  }
  return value;
}

function expectStringArray(value: unknown, path: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${path} must be a non-empty array`);
  }
  return value.map((item, index) => expectString(item, `${path}[${index}]`));
}

function expectBBox(
  value: unknown,
  path: string,
): [number, number, number, number] {
  if (!Array.isArray(value) || value.length !== 4) {
    throw new Error(`${path} must be [minlon, minlat, maxlon, maxlat]`);
  }
  const [minLon, minLat, maxLon, maxLat] = value.map((item, index) =>
    expectNumber(item, `${path}[${index}]`),
  );
  if (minLon > maxLon || minLat > maxLat) {
    throw new Error(`${path} minimums must not exceed maximums`);
  }
  return [minLon, minLat, maxLon, maxLat];
}

function expectPositions(value: unknown, path: string): GeoJSON.Position[] {
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array of positions`);
  }
  return value.map((position, index) => {
    if (!Array.isArray(position) || position.length < 2) {
      throw new Error(`${path}[${index}] must be a [lon, lat] position`);
    }
    return position.map((coordinate, axis) =>
      expectNumber(coordinate, `${path}[${index}][${axis}]`),
    );
  });
}

function expectRings(value: unknown, path: string): GeoJSON.Position[][] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${path} must be a non-empty array of rings`);
  }
  return value.map((ring, index) => {
    const positions = expectPositions(ring, `${path}[${index}]`);
    if (positions.length < 4) {
      throw new Error(`${path}[${index}] must have at least 4 positions`);
    }
    return positions;
  });
}

function expectPolygonal(
  value: unknown,
  path: string,
): GeoJSON.Polygon | GeoJSON.MultiPolygon {
  const object = expectObject(value, path);
  switch (object.type) {
    case "Polygon":
      return {
        type: "Polygon",
        coordinates: expectRings(object.coordinates, `${path}.coordinates`),
      };
    case "MultiPolygon":
      if (!Array.isArray(object.coordinates)) {
        throw new Error(`${path}.coordinates must be an array of polygons`);
      }
      return {
        type: "MultiPolygon",
        coordinates: object.coordinates.map((polygon, index) =>
          expectRings(polygon, `${path}.coordinates[${index}]`),
        ),
      };
    default:
      throw new Error(`${path} must be a Polygon or MultiPolygon`);
  }
}
