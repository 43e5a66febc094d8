/** The entity (usually a player) an account schema is resolved for. */
export interface AccountOwner {
  readonly id: string
  readonly name: string
}
