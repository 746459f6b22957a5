/**
 * HTTP 200 OK status code
 * @description standard response for successful HTTP requests.
 */
export const HTTP_OK = 200;
/**
 * HTTP 302 Found status code
 * @description used by the authorization endpoint to send the user agent back to the client.
 */
export const HTTP_FOUND = 302;
/**
 * HTTP 400 Bad Request status code
 * @description the server cannot or will not process the request due to client error.
 */
export const HTTP_BAD_REQUEST = 400;
/**
 * HTTP 401 Unauthorized status code
 * @description authentication is required and has failed or has not been provided.
 */
export const HTTP_UNAUTHORIZED = 401;
/**
 * HTTP 500 Internal Server Error status code
 * @description a generic error message when the server encounters an unexpected condition.
 */
export const HTTP_INTERNAL_SERVER_ERROR = 500;
