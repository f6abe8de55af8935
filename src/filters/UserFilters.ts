import { Action } from "../adiff/ChangeContainer";
import ChangeFilter from "./ChangeFilter";

/**
 * Triggers when the last user to touch an object changes from the watched
 * user to someone else.
 */
export class UserIDChangedFilter implements ChangeFilter {
  constructor(private readonly uid: number) {}

  explanation(): string {
    return `User ID changed from ${this.uid}`;
  }

  matches(action: Action): boolean {
    const oldUID = action.old?.uid;
    const newUID = action.new?.uid;
    return oldUID === this.uid && newUID !== undefined && newUID !== this.uid;
  }
}

/**
 * Triggers on any change made by the watched user.
 */
export class UserIDMadeChangeFilter implements ChangeFilter {
  constructor(private readonly uid: number) {}

  explanation(): string {
    return `User ID ${this.uid} made a change`;
  }

  matches(action: Action): boolean {
    return action.new?.uid === this.uid;
  }
}

/**
 * Triggers on changes by a user not yet in `seenUserIDs`, recording them so
 * later changes by the same user don't trigger again.
 *
 * The set is owned by the caller and should live as long as the monitoring
 * run. Evaluate each action at most once per instance.
 */
export class NewUserFilter implements ChangeFilter {
  constructor(readonly seenUserIDs: Set<number>) {}

  explanation(): string {
    return "New user made a change";
  }

  matches(action: Action): boolean {
    const uid = action.new?.uid;
    if (uid === undefined || this.seenUserIDs.has(uid)) {
      return false;
    }
    this.seenUserIDs.add(uid);
    return true;
  }
}
