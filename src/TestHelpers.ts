import { Action } from "./adiff/ChangeContainer";
import { Changeset } from "./osm/Changeset";
import {
  NodeRef,
  OSMNode,
  OSMRelation,
  OSMType,
  OSMWay,
} from "./osm/OSMObject";

export function mockNode(
  properties: Partial<Omit<OSMNode, "type">> = {},
): OSMNode {
  return {
    type: OSMType.Node,
    id: 1,
    version: 1,
    uid: 100,
    user: "mapper",
    changeset: 1000,
    visible: true,
    tags: {},
    lat: 0,
    lon: 0,
    ...properties,
  };
}

export function mockWay(
  nodes: [number, number, number][],
  properties: Partial<Omit<OSMWay, "type" | "nodes">> = {},
): OSMWay {
  return {
    type: OSMType.Way,
    id: 2,
    version: 1,
    uid: 100,
    user: "mapper",
    changeset: 1000,
    visible: true,
    tags: {},
    ...properties,
    nodes: nodes.map(([ref, lon, lat]): NodeRef => ({ ref, lon, lat })),
  };
}

export function mockRelation(
  properties: Partial<Omit<OSMRelation, "type">> = {},
): OSMRelation {
  return {
    type: OSMType.Relation,
    id: 3,
    version: 1,
    uid: 100,
    user: "mapper",
    changeset: 1000,
    visible: true,
    tags: {},
    members: [{ type: OSMType.Node, ref: 1, role: "" }],
    ...properties,
  };
}

export function mockModify<T extends OSMNode | OSMWay | OSMRelation>(
  old: T,
  changes: Partial<T>,
): Action {
  return { kind: "modify", old, new: { ...old, ...changes } };
}

export function mockCreate(object: OSMNode | OSMWay | OSMRelation): Action {
  return { kind: "create", new: object };
}

export function mockChangeset(properties: Partial<Changeset> = {}): Changeset {
  return {
    id: 1000,
    createdAt: new Date("2024-05-01T10:00:00Z"),
    closedAt: new Date("2024-05-01T11:00:00Z"),
    open: false,
    userId: 100,
    userName: "mapper",
    commentsCount: 0,
    tags: {},
    ...properties,
  };
}

/**
 * Wraps action bodies in a minimal augmented diff document.
 */
export function augmentedDiffXML(actions: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<osm version="0.6" generator="test-generator">
  <note>Test diff</note>
  ${actions.join("\n  ")}
</osm>`;
}
