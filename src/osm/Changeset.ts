import {
  childElements,
  optionalDateAttribute,
  optionalNumberAttribute,
  requiredAttribute,
  requiredNumberAttribute,
  tagsOf,
} from "../io/XMLElements";
import { DecodeError } from "./DecodeError";
import { OSMTags } from "./OSMObject";

export type Changeset = {
  readonly id: number;
  readonly createdAt: Date;
  readonly closedAt?: Date;
  readonly open: boolean;
  readonly minLat?: number;
  readonly minLon?: number;
  readonly maxLat?: number;
  readonly maxLon?: number;
  readonly userId: number;
  readonly userName: string;
  readonly commentsCount: number;
  readonly tags: Readonly<OSMTags>;
};

export function decodeChangeset(element: Element): Changeset {
  const createdAt = optionalDateAttribute(element, "created_at");
  if (!createdAt) {
    throw new DecodeError(
      "MalformedElement",
      `changeset ${element.getAttribute("id")} has no valid created_at`,
    );
  }

  return {
    id: requiredNumberAttribute(element, "id"),
    createdAt,
    closedAt: optionalDateAttribute(element, "closed_at"),
    open: element.getAttribute("open") === "true",
    minLat: optionalNumberAttribute(element, "min_lat"),
    minLon: optionalNumberAttribute(element, "min_lon"),
    maxLat: optionalNumberAttribute(element, "max_lat"),
    maxLon: optionalNumberAttribute(element, "max_lon"),
    userId: requiredNumberAttribute(element, "uid"),
    userName: requiredAttribute(element, "user"),
    commentsCount: optionalNumberAttribute(element, "comments_count") ?? 0,
    tags: tagsOf(element),
  };
}

/**
 * Decodes every `<changeset>` under an `<osm>` root.
 */
export function decodeChangesets(root: Element): Changeset[] {
  return childElements(root, "changeset").map(decodeChangeset);
}
