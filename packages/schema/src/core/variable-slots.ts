import type { Variable } from "../ports/variable"
import { VariableAlreadySuppliedError } from "./errors"

interface Slot {
  variable: Variable
  supplied: boolean
}

export interface SlotOptions {
  /** Start as optional: the value is already known. */
  supplied?: boolean
}

/**
 * The variables of one schema instance, split into required (not yet
 * supplied) and optional (supplied, or never needed).
 *
 * A slot moves from required to optional once `apply` accepts a value, and
 * never moves back.
 */
export class VariableSlots {
  private readonly slots: Slot[] = []

  define(
    name: string,
    purpose: string,
    apply: (value: unknown) => void,
    options: SlotOptions = {},
  ): void {
    const slot: Slot = {
      supplied: options.supplied ?? false,
      variable: {
        name,
        purpose,
        supply: (value) => {
          if (slot.supplied) throw new VariableAlreadySuppliedError(name)

          apply(value)
          slot.supplied = true
        },
      },
    }

    this.slots.push(slot)
  }

  required(): Variable[] {
    return this.slots.filter((slot) => !slot.supplied).map((slot) => slot.variable)
  }

  optional(): Variable[] {
    return this.slots.filter((slot) => slot.supplied).map((slot) => slot.variable)
  }

  get complete(): boolean {
    return this.slots.every((slot) => slot.supplied)
  }
}
