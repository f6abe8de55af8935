import { DecodeError } from "../osm/DecodeError";
import { OSMObject } from "../osm/OSMObject";

export type ActionKind = "create" | "modify" | "delete";

export function isActionKind(value: string): value is ActionKind {
  return value === "create" || value === "modify" || value === "delete";
}

/**
 * One change in a diff: the object before and after the edit. `old` is absent
 * for creates; for deletes `new` is at most an identity stub.
 */
export interface Action {
  readonly kind: ActionKind;
  readonly old?: OSMObject;
  readonly new?: OSMObject;
}

export function actionObject(action: Action): OSMObject | undefined {
  return action.old ?? action.new;
}

export function actionChangesetID(action: Action): number | undefined {
  return action.new?.changeset ?? action.old?.changeset;
}

export class ChangeContainer {
  readonly version: string;
  readonly generator: string;
  readonly note?: string;
  readonly creates: readonly Action[];
  readonly modifies: readonly Action[];
  readonly deletes: readonly Action[];
  // Actions that could not be decoded and were left out of the lists above.
  readonly dropped: readonly DecodeError[];

  constructor(properties: {
    version: string;
    generator: string;
    note?: string;
    creates?: readonly Action[];
    modifies?: readonly Action[];
    deletes?: readonly Action[];
    dropped?: readonly DecodeError[];
  }) {
    this.version = properties.version;
    this.generator = properties.generator;
    this.note = properties.note;
    this.creates = properties.creates ?? [];
    this.modifies = properties.modifies ?? [];
    this.deletes = properties.deletes ?? [];
    this.dropped = properties.dropped ?? [];
  }

  /**
   * All actions, creates first, then modifies, then deletes.
   */
  changes(): Action[] {
    return [...this.creates, ...this.modifies, ...this.deletes];
  }
}
