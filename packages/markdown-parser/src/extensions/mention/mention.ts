/**
 * A recognized mention handed to a generator. Generators set `url` (and
 * optionally `label`) and return it, or return null to leave the text alone.
 */
export class Mention {
  url = ""
  label: string

  constructor(
    readonly name: string,
    readonly prefix: string,
    readonly identifier: string,
    label?: string,
  ) {
    this.label = label ?? `${prefix}${identifier}`
  }
}
