/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/** Port the server listens at and the client connects to by default. */
export const DEFAULT_PORT = 12800;

/** Host the server listens on and the client connects to by default. */
export const DEFAULT_HOST = 'localhost';

/** Where debugging traces go. */
export type DebugLog = (message: string) => void;

/** Drops every trace. */
export const quiet: DebugLog = () => undefined;

/**
 * @param env environment variables
 * @returns a log printing traces when DEBUG_MAZE is set, or quiet
 */
export function debugLog(env: NodeJS.ProcessEnv): DebugLog {
    return env['DEBUG_MAZE'] ? message => console.log(message) : quiet;
}

/** Settings of a game server. */
export interface ServerConfig {
    readonly host: string;
    readonly port: number;
    readonly mapFile: string;
    /** port of the HTTP status endpoint, or undefined to run without one */
    readonly statusPort: number | undefined;
}

/** Settings of a client. */
export interface ClientConfig {
    readonly host: string;
    readonly port: number;
}

/**
 * @param text port number as typed by a user
 * @returns the port
 * @throws Error if `text` is not an integer between 0 and 65535
 */
export function parsePort(text: string): number {
    const port = /^\d+$/.test(text) ? parseInt(text) : NaN;
    if (isNaN(port) || port > 65535) {
        throw new Error(`invalid port '${text}': the port is a number between 0 and 65535`);
    }
    return port;
}

/**
 * Read the server settings.
 *
 * Command-line usage:
 *     npm start PORT MAPFILE
 * where PORT is the port to listen at (0 for any free port, `-` for the
 * default port) and MAPFILE is the path to a map file.
 * Environment: HOST, the interface to listen on; STATUS_PORT, the port of
 * the HTTP status endpoint, which is only started when it is set.
 *
 * @param args command-line arguments after the script name
 * @param env environment variables
 * @returns the server settings
 * @throws Error if an argument or variable is missing or invalid
 */
export function serverConfig(args: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
    const [ portString, mapFile ] = args;
    if (portString === undefined) { throw new Error('missing PORT'); }
    if (mapFile === undefined) { throw new Error('missing MAPFILE'); }
    const statusPort = env['STATUS_PORT'];
    return {
        host: env['HOST'] || DEFAULT_HOST,
        port: portString === '-' ? DEFAULT_PORT : parsePort(portString),
        mapFile,
        statusPort: statusPort ? parsePort(statusPort) : undefined,
    };
}

/**
 * Read the client settings.
 *
 * Command-line usage:
 *     npm run client [HOST] [PORT]
 *
 * @param args command-line arguments after the script name
 * @returns the client settings
 * @throws Error if the port is invalid
 */
export function clientConfig(args: readonly string[]): ClientConfig {
    const [ host, portString ] = args;
    return {
        host: host ?? DEFAULT_HOST,
        port: portString === undefined ? DEFAULT_PORT : parsePort(portString),
    };
}
