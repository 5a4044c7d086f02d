/**
 * Destination ownership
 *
 * A destination is drawn on by at most one writer at a time. The claim is
 * taken when a writer opens, so two writers can never interleave cursor
 * movements on one stream.
 */

import { DestinationInUseError } from '../errors.js';

const owners = new WeakMap<object, string>();

export function claimDestination(destination: object, writerId: string): void {
  const owner = owners.get(destination);
  if (owner !== undefined) {
    throw new DestinationInUseError(owner);
  }
  owners.set(destination, writerId);
}

export function releaseDestination(destination: object, writerId: string): void {
  if (owners.get(destination) === writerId) {
    owners.delete(destination);
  }
}

export function destinationOwner(destination: object): string | undefined {
  return owners.get(destination);
}
