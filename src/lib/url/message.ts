/**
 * Chat message → URL / search query / user target
 */

import type { MessageEntity, User } from 'grammy/types';

/** The fields of a Telegram message the adapter reads */
export interface MessageLike {
    text?: string;
    caption?: string;
    entities?: MessageEntity[];
    caption_entities?: MessageEntity[];
    from?: User;
    reply_to_message?: MessageLike;
}

export type UserTarget =
    | { kind: 'id'; id: number }
    | { kind: 'username'; username: string };

export class ExtractionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ExtractionError';
    }
}

const USERNAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]{4,31}$/;

export function isValidUsername(value: string): boolean {
    return USERNAME_PATTERN.test(value);
}

function urlFromEntities(text: string | undefined, entities: MessageEntity[] | undefined): string | null {
    if (!entities) return null;
    for (const entity of entities) {
        if (entity.type === 'url' && text) {
            // Offsets are UTF-16 code units, same as JS strings
            return text.slice(entity.offset, entity.offset + entity.length);
        }
        if (entity.type === 'text_link') {
            return entity.url;
        }
    }
    return null;
}

/**
 * First url / text_link entity of the message, then of the message it replies to
 */
export function extractUrl(message: MessageLike): string | null {
    const candidates = message.reply_to_message ? [message, message.reply_to_message] : [message];
    for (const msg of candidates) {
        const found = urlFromEntities(msg.text, msg.entities) ?? urlFromEntities(msg.caption, msg.caption_entities);
        if (found) return found;
    }
    return null;
}

/**
 * Text after the leading /command (or /command@bot), whitespace collapsed
 */
export function extractQuery(message: MessageLike): string | null {
    const text = (message.text ?? message.caption ?? '').trim();
    const withoutCommand = text.startsWith('/') ? text.replace(/^\/\S+/, '') : text;
    const query = withoutCommand.replace(/\s+/g, ' ').trim();
    return query || null;
}

/**
 * Who a moderation-style command is aimed at: the replied-to sender, a text
 * mention, a numeric id or a username
 */
export function extractUserTarget(message: MessageLike): UserTarget {
    const repliedSender = message.reply_to_message?.from;
    if (repliedSender) {
        return { kind: 'id', id: repliedSender.id };
    }

    const text = message.text ?? '';
    const tokens = text.trim().split(/\s+/);
    const entities = message.entities ?? [];
    if (entities.length === 0 || tokens.length < 2) {
        throw new ExtractionError('No user argument found.');
    }

    const entity = text.startsWith('/') && entities.length > 1 ? entities[1] : entities[0];
    if (entity.type === 'text_mention') {
        return { kind: 'id', id: entity.user.id };
    }

    const value = tokens[1];
    if (/^\d+$/.test(value)) {
        return { kind: 'id', id: Number(value) };
    }
    const username = value.startsWith('@') ? value.slice(1) : value;
    if (isValidUsername(username)) {
        return { kind: 'username', username };
    }
    throw new ExtractionError('Invalid user identifier: must be a user ID or a valid username.');
}
