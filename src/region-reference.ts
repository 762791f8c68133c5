/**
 * Opaque pointer to a previously stored selection. Only the storage handle
 * knows how to turn `address` back into a dataspace.
 */
export class RegionReference<Address = unknown> {
  readonly address: Address

  constructor(address: Address) {
    this.address = address
  }
}
