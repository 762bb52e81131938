/** Caller passed an action, player index or outcome the current state does not accept */
export class InvalidActionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidActionError'
  }
}

/** A coordinate outside the grid reached a layout query */
export class OutOfBoundsError extends Error {
  constructor(row: number, col: number) {
    super(`Coordinate (${row}, ${col}) is outside the grid`)
    this.name = 'OutOfBoundsError'
  }
}

/** Rewards or observations were requested before the episode was set up */
export class StaleStateAccessError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StaleStateAccessError'
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidConfigError'
  }
}

export class LayoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LayoutError'
  }
}
