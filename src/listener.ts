/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { MessageBus } from './bus.js';
import type { ClientId } from './player.js';
import { quiet, type DebugLog } from './config.js';
import { ClientMessageSchema, type Envelope } from './protocol.js';

/** What a listener reads from: one message at a time, in order. */
export interface MessageSource {
    receive(): Promise<unknown>;
}

/**
 * Reads the messages of one client and forwards them to the server loop.
 *
 * A listener first pushes a `new_player` envelope, then one `command`
 * envelope per valid message. When reading fails, or a message is not a
 * valid command, it pushes a `left` envelope and stops; `left` is always
 * the last envelope a listener pushes.
 */
export class ConnectionListener {

    private stopped = false;

    /**
     * @param clientId client the envelopes are tagged with
     * @param name display name announced in `new_player`
     * @param source connection to read from
     * @param bus bus to push envelopes onto
     * @param debug where read failures are traced
     */
    public constructor(
        public readonly clientId: ClientId,
        public readonly name: string,
        private readonly source: MessageSource,
        private readonly bus: MessageBus<Envelope>,
        private readonly debug: DebugLog = quiet
    ) {}

    /**
     * Announce the client, then forward its messages until the connection fails.
     *
     * @returns (a promise that) resolves once `left` has been pushed
     */
    public async run(): Promise<void> {
        this.bus.push({ sender: this.clientId, category: 'new_player', payload: this.name });
        while (!this.stopped) {
            let message: unknown;
            try {
                message = await this.source.receive();
            } catch (err) {
                this.debug(`${this.clientId}: ${err}`);
                break;
            }
            const parsed = ClientMessageSchema.safeParse(message);
            if (!parsed.success) {
                console.error(`invalid message from ${this.clientId}: ${parsed.error.message}`);
                break;
            }
            const [ , line ] = parsed.data;
            this.bus.push({ sender: this.clientId, category: 'command', payload: line });
        }
        this.stop();
    }

    // push `left` the first time only
    private stop(): void {
        if (!this.stopped) {
            this.stopped = true;
            this.bus.push({ sender: this.clientId, category: 'left', payload: null });
        }
    }
}
