import { Column } from "./decorators";

/**
 * A row of a lookup ("enum") table: its display name and its value,
 * usually the row id.
 */
export class DbEnum<V = number> {
  @Column()
  name!: string;

  @Column()
  value!: V;
}
