/** Injected in place of the global fetch by tests */
export type FetchImpl = (url: string | URL | Request, init?: RequestInit) => Promise<Response>;
