/**
 * Error taxonomy for catalog lookups and queries.
 * All errors are thrown synchronously from the offending call.
 */

export class FontCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown family name, face name or information key */
export class NotFoundError extends FontCatalogError {}

/** Integer index outside the family or collection range */
export class IndexOutOfRangeError extends FontCatalogError {}

/** Malformed query filters, options or snapshot (strict mode) */
export class InvalidArgumentError extends FontCatalogError {}

/** A filter value of a type that cannot be compared to a property value */
export class TypeMismatchError extends InvalidArgumentError {}
