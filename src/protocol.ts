/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { z } from 'zod';
import type { ClientId } from './player.js';

/*
 * Messages exchanged between clients and the server.
 *
 * On the wire a message is a JSON pair [category, payload]:
 *   client -> server:  ["command", <command line>]
 *   server -> client:  ["display", <text>]
 *                      ["validation_schema", <regular expression every command line must fully match>]
 *                      ["validation_error", <text shown when a line does not match>]
 *                      ["end", null]    the game is over, the client may disconnect
 *
 * Inside the server, listeners wrap what they receive in envelopes tagged
 * with the sending client; `new_player` and `left` envelopes are produced by
 * the listener itself when a connection opens and closes.
 */

/** Longest command line the server plays, in characters; longer lines queue no command. */
export const MAX_COMMAND_LENGTH = 4096;

export const ClientMessageSchema = z.tuple([
    z.literal('command'),
    z.string(),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export const OutboundCategorySchema = z.enum([ 'display', 'validation_schema', 'validation_error', 'end' ]);

export type OutboundCategory = z.infer<typeof OutboundCategorySchema>;

export const ServerMessageSchema = z.tuple([
    OutboundCategorySchema,
    z.string().nullable(),
]);

export type ServerMessage = z.infer<typeof ServerMessageSchema>;

/** What a listener pushes onto the bus for the server loop. */
export type Envelope =
    | { readonly sender: ClientId; readonly category: 'new_player'; readonly payload: string }
    | { readonly sender: ClientId; readonly category: 'command'; readonly payload: string }
    | { readonly sender: ClientId; readonly category: 'left'; readonly payload: null };

/** An outbound message addressed to one client. */
export interface Datagram {
    readonly recipient: ClientId;
    readonly category: OutboundCategory;
    readonly payload: string | null;
}
