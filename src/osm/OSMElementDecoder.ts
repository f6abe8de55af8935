import {
  childElements,
  optionalAttribute,
  optionalDateAttribute,
  optionalNumberAttribute,
  requiredAttribute,
  requiredNumberAttribute,
  tagsOf,
} from "../io/XMLElements";
import { DecodeError } from "./DecodeError";
import {
  NodeRef,
  OSMNode,
  OSMObject,
  OSMRelation,
  OSMType,
  OSMWay,
  RelationMember,
  isOSMType,
} from "./OSMObject";

export function decodeOSMElement(element: Element): OSMObject {
  switch (element.tagName) {
    case OSMType.Node:
      return decodeNode(element);
    case OSMType.Way:
      return decodeWay(element);
    case OSMType.Relation:
      return decodeRelation(element);
    default:
      throw new DecodeError(
        "UnknownElementKind",
        `unexpected element <${element.tagName}>`,
      );
  }
}

function decodeCommon(element: Element) {
  return {
    id: requiredNumberAttribute(element, "id"),
    version: optionalNumberAttribute(element, "version"),
    timestamp: optionalDateAttribute(element, "timestamp"),
    uid: optionalNumberAttribute(element, "uid"),
    user: optionalAttribute(element, "user"),
    changeset: optionalNumberAttribute(element, "changeset"),
    visible: element.getAttribute("visible") !== "false",
    tags: tagsOf(element),
  };
}

function decodeNode(element: Element): OSMNode {
  return {
    type: OSMType.Node,
    ...decodeCommon(element),
    lat: optionalNumberAttribute(element, "lat"),
    lon: optionalNumberAttribute(element, "lon"),
  };
}

function decodeWay(element: Element): OSMWay {
  return {
    type: OSMType.Way,
    ...decodeCommon(element),
    nodes: childElements(element, "nd").map(decodeNodeRef),
  };
}

function decodeNodeRef(element: Element): NodeRef {
  return {
    ref: requiredNumberAttribute(element, "ref"),
    lat: optionalNumberAttribute(element, "lat"),
    lon: optionalNumberAttribute(element, "lon"),
  };
}

function decodeRelation(element: Element): OSMRelation {
  return {
    type: OSMType.Relation,
    ...decodeCommon(element),
    members: childElements(element, "member").map(decodeMember),
  };
}

function decodeMember(element: Element): RelationMember {
  const type = requiredAttribute(element, "type");
  if (!isOSMType(type)) {
    throw new DecodeError(
      "MalformedElement",
      `relation member has unknown type "${type}"`,
    );
  }
  return {
    type,
    ref: requiredNumberAttribute(element, "ref"),
    role: element.getAttribute("role") ?? "",
  };
}
