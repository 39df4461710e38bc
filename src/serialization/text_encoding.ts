/**
 * UTF-8 text encoding utilities.
 *
 * The decoder is fatal: malformed input throws a TypeError instead of being
 * replaced with U+FFFD, so corrupt strings surface as errors.
 */
export const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Encodes a string into a Uint8Array using UTF-8 encoding.
 * @param input The string to encode.
 * @returns A Uint8Array representing the encoded string.
 */
export const encode = (input: string): Uint8Array => encoder.encode(input);

/**
 * Decodes a Uint8Array into a string using UTF-8 encoding.
 * @param bytes The Uint8Array to decode.
 * @returns The decoded string.
 * @throws TypeError if the bytes are not valid UTF-8.
 */
export const decode = (bytes: Uint8Array): string => decoder.decode(bytes);
