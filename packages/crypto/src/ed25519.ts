/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods of @noble/ed25519 are used; they hash with the
 * built-in Web Crypto and need no configuration. Other modules import from
 * this file, never directly from '@noble/ed25519'.
 *
 * Private keys are 32-byte seeds, public keys 32-byte compressed points.
 */

import { signAsync, verifyAsync, getPublicKeyAsync, utils } from '@noble/ed25519';

/** Sign a message with Ed25519 (async, Web Crypto backed) */
export const sign = signAsync;

/** Verify an Ed25519 signature (async, Web Crypto backed) */
export const verify = verifyAsync;

/** Derive public key from private key (async, Web Crypto backed) */
export const getPublicKey = getPublicKeyAsync;

/** Generate a cryptographically random 32-byte secret key (CSPRNG) */
export const randomSecretKey = utils.randomPrivateKey;
