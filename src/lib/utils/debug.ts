/**
 * Debug logging for acme-bootstrap
 *
 * Built on the `debug` package and enabled through the DEBUG environment variable:
 *
 * DEBUG=acme-bootstrap:*         - All debug output
 * DEBUG=acme-bootstrap:nonce     - Only nonce source debug
 * DEBUG=acme-bootstrap:http      - Only HTTP debug
 * DEBUG=acme-bootstrap:retry     - Only retry decisions
 *
 * Nothing is printed unless DEBUG selects the namespace.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'acme-bootstrap';

const createDebugger = (namespace: string): debug.Debugger =>
  debug(`${ROOT_NAMESPACE}:${namespace}`);

export const debugNonce = createDebugger('nonce');
export const debugHttp = createDebugger('http');
export const debugRetry = createDebugger('retry');
export const debugAccount = createDebugger('account');
export const debugDirectory = createDebugger('directory');
export const debugPersist = createDebugger('persist');
