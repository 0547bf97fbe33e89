/** Read the HTTP status carried by a known error shape; anything else maps to 500. */
export function inferStatusCode(error: unknown): number {
  if (
    error &&
    typeof error === 'object' &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }

  return 500;
}
