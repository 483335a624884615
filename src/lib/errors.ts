export class AppError extends Error {
  code: string
  statusCode: number

  constructor(message: string, code: string, statusCode: number) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.statusCode = statusCode
  }
}

export const badRequest = (message: string) => new AppError(message, 'invalid_input', 400)
export const notFound = (message: string) => new AppError(message, 'not_found', 404)
export const conflict = (message: string) => new AppError(message, 'conflict', 409)
export const locked = () =>
  new AppError('Picks are locked - tournament has started.', 'locked', 423)

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message

  // Supabase errors are plain objects
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message)
  }

  if (typeof error === 'string') return error

  return 'An unexpected error occurred'
}
