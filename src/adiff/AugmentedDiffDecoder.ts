import {
  childElements,
  firstChildElement,
  optionalAttribute,
  parseXMLDocument,
} from "../io/XMLElements";
import { DecodeError } from "../osm/DecodeError";
import { decodeOSMElement } from "../osm/OSMElementDecoder";
import { OSMObject, osmID } from "../osm/OSMObject";
import { Action, ChangeContainer, isActionKind } from "./ChangeContainer";

/**
 * Decodes one augmented diff (`<osm>` root with `<action>` children) into a
 * container of classified actions.
 *
 * Throws `DecodeError("MalformedDocument")` if the document can't be parsed
 * or lacks its `version`/`generator` attributes. Individual actions that
 * can't be decoded are dropped with a warning and kept on
 * `ChangeContainer.dropped`.
 */
export function decodeAugmentedDiff(xml: string): ChangeContainer {
  const root = parseXMLDocument(xml);

  const version = optionalAttribute(root, "version");
  const generator = optionalAttribute(root, "generator");
  if (version === undefined || generator === undefined) {
    throw new DecodeError(
      "MalformedDocument",
      `<${root.tagName}> is missing its version or generator attribute`,
    );
  }

  const creates: Action[] = [];
  const modifies: Action[] = [];
  const deletes: Action[] = [];
  const dropped: DecodeError[] = [];

  childElements(root, "action").forEach((actionElement, index) => {
    let action: Action;
    try {
      action = decodeAction(actionElement);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      console.warn(`Dropping action #${index}: ${error.message}`);
      dropped.push(error);
      return;
    }

    switch (action.kind) {
      case "create":
        creates.push(action);
        break;
      case "modify":
        modifies.push(action);
        break;
      case "delete":
        deletes.push(action);
        break;
    }
  });

  return new ChangeContainer({
    version,
    generator,
    note: noteOf(root),
    creates,
    modifies,
    deletes,
    dropped,
  });
}

export function decodeAction(element: Element): Action {
  const kind = element.getAttribute("type") ?? "";
  if (!isActionKind(kind)) {
    throw new DecodeError(
      "UnknownActionKind",
      `unexpected action type "${kind}"`,
    );
  }

  let old = decodeWrapped(element, "old");
  let newObject = decodeWrapped(element, "new");

  // Creates may carry the new object directly instead of in a <new> wrapper.
  if (kind === "create" && !newObject) {
    const direct = childElements(element).find(
      (child) => child.tagName !== "old" && child.tagName !== "new",
    );
    newObject = direct ? decodeOSMElement(direct) : undefined;
  }

  if (old && newObject) {
    if (old.type !== newObject.type || old.id !== newObject.id) {
      throw new DecodeError(
        "MalformedElement",
        `${kind} pairs ${osmID(old)} with ${osmID(newObject)}`,
      );
    }
  }

  // The declared kind is authoritative over what the wrappers contain.
  if (kind === "create" && old) {
    console.warn(`Ignoring old object of created ${osmID(old)}`);
    old = undefined;
  }
  if (kind === "delete" && newObject && hasTags(newObject)) {
    newObject = { ...newObject, tags: {} };
  }

  return { kind, old, new: newObject };
}

function decodeWrapped(
  actionElement: Element,
  wrapper: "old" | "new",
): OSMObject | undefined {
  const wrapperElement = firstChildElement(actionElement, wrapper);
  if (!wrapperElement) {
    return undefined;
  }
  const element = firstChildElement(wrapperElement);
  return element ? decodeOSMElement(element) : undefined;
}

function hasTags(object: OSMObject): boolean {
  return Object.keys(object.tags).length > 0;
}

function noteOf(root: Element): string | undefined {
  const attribute = optionalAttribute(root, "note");
  if (attribute !== undefined) {
    return attribute;
  }
  const noteElement = firstChildElement(root, "note");
  const text = noteElement?.textContent?.trim();
  return text ? text : undefined;
}
