/**
 * Typed failures raised by the jump engine.
 *
 * Configuration problems are caught before integration starts; domain
 * problems abort the run at the step where the model stops being valid.
 */

export class SimulationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SimulationError'
  }
}

/** A SkierParameters field that cannot describe a physical skier. */
export class ConfigurationError extends SimulationError {
  readonly field: string

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`)
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * The model was asked for a value outside the region it describes
 * (hill position, flight direction, step budget).
 */
export class ModelDomainError extends SimulationError {
  readonly quantity: string
  readonly value: number

  constructor(quantity: string, value: number, message: string) {
    super(`Model domain exceeded (${quantity} = ${value}): ${message}`)
    this.name = 'ModelDomainError'
    this.quantity = quantity
    this.value = value
  }
}
