import * as _ from "lodash";

export enum OSMType {
  Node = "node",
  Way = "way",
  Relation = "relation",
}

export type OSMTags = { [key: string]: string };

interface OSMObjectBase {
  // OpenStreetMap ID, note: only unique within the `type` of the object.
  readonly id: number;
  // Untagged objects in augmented diffs may carry nothing but their ID, so
  // metadata is optional rather than zeroed.
  readonly version?: number;
  readonly timestamp?: Date;
  readonly uid?: number;
  readonly user?: string;
  readonly changeset?: number;
  readonly visible: boolean;
  readonly tags: Readonly<OSMTags>;
}

export interface OSMNode extends OSMObjectBase {
  readonly type: OSMType.Node;
  readonly lat?: number;
  readonly lon?: number;
}

export interface NodeRef {
  readonly ref: number;
  readonly lat?: number;
  readonly lon?: number;
}

export interface OSMWay extends OSMObjectBase {
  readonly type: OSMType.Way;
  readonly nodes: readonly NodeRef[];
}

export interface RelationMember {
  readonly type: OSMType;
  readonly ref: number;
  readonly role: string;
}

export interface OSMRelation extends OSMObjectBase {
  readonly type: OSMType.Relation;
  readonly members: readonly RelationMember[];
}

export type OSMObject = OSMNode | OSMWay | OSMRelation;

export function isOSMType(value: string): value is OSMType {
  return (
    value === OSMType.Node ||
    value === OSMType.Way ||
    value === OSMType.Relation
  );
}

export function osmID(object: { type: OSMType; id: number }): string {
  return object.type + "/" + object.id;
}

/**
 * Tag lookup that treats a missing object the same as a missing tag.
 */
export function getTag(
  object: OSMObject | undefined,
  key: string,
): string | undefined {
  if (!object || !_.has(object.tags, key)) {
    return undefined;
  }
  return object.tags[key];
}
