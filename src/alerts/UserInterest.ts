import ChangeFilter from "../filters/ChangeFilter";

export interface UserInterest {
  // Who gets alerted, not an OSM user ID.
  userId: string;
  filters: ChangeFilter[];
}
