export const EXIT_OK = 0
/** The run finished with nodes still pending or failed */
export const EXIT_UNRESOLVED = 1
export const EXIT_USAGE = 2
export const EXIT_FATAL = 3
