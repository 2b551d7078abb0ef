/** Command completed */
export const EXIT_SUCCESS = 0
/** Property not found, or the file could not be read or written */
export const EXIT_ERROR = 1
/** Bad key, bad value or malformed settings file */
export const EXIT_INVALID = 2
