import { Action, actionObject } from "../adiff/ChangeContainer";
import { OSMType, isOSMType } from "../osm/OSMObject";
import ChangeFilter from "./ChangeFilter";

/**
 * Triggers on any change to one specific object.
 */
export default class ObjectChangedFilter implements ChangeFilter {
  private readonly type: OSMType;

  constructor(
    type: string,
    private readonly id: number,
  ) {
    if (!isOSMType(type)) {
      throw new Error(`Invalid object type: ${type}`);
    }
    this.type = type;
  }

  explanation(): string {
    return `Object ${this.type} ${this.id} changed`;
  }

  matches(action: Action): boolean {
    // old and new share type and ID, so either one identifies the object.
    const object = actionObject(action);
    return object?.type === this.type && object.id === this.id;
  }
}
