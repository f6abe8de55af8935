import * as _ from "lodash";
import { Action } from "../adiff/ChangeContainer";
import { getTag } from "../osm/OSMObject";
import ChangeFilter from "./ChangeFilter";

const maxListedValues = 3;

/**
 * Triggers when a tag appears with, or changes to, one of the given values.
 * A tag that already had a watched value and kept it does not trigger.
 */
export class TagValueInListFilter implements ChangeFilter {
  constructor(
    private readonly key: string,
    private readonly values: readonly string[],
  ) {}

  explanation(): string {
    const listed = this.values.slice(0, maxListedValues).join(", ");
    const explanation = `Tag ${this.key} changed to one of [${listed}]`;
    if (this.values.length > maxListedValues) {
      return `${explanation} and ${this.values.length - maxListedValues} more`;
    }
    return explanation;
  }

  matches(action: Action): boolean {
    const oldValue = getTag(action.old, this.key);
    const newValue = getTag(action.new, this.key);
    return (
      oldValue !== newValue &&
      newValue !== undefined &&
      this.values.includes(newValue)
    );
  }
}

/**
 * Triggers on edits to, deletion of, or creation of an object carrying
 * `key=value`.
 */
export class ObjectWithTagChangedFilter implements ChangeFilter {
  constructor(
    private readonly key: string,
    private readonly value: string,
  ) {}

  explanation(): string {
    return `Object with tag ${this.key}=${this.value} changed`;
  }

  matches(action: Action): boolean {
    if (
      getTag(action.old, this.key) === this.value &&
      !_.isEqual(action.old, action.new)
    ) {
      return true;
    }
    return (
      action.kind === "create" && getTag(action.new, this.key) === this.value
    );
  }
}
