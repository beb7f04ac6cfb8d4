/** Raised when an operation is handed input it cannot work with */
export class ValueError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ValueError'
  }
}
