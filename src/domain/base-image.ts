/**
 * Base image reference parsing.
 */

import { Success, Failure, type Result, type BaseImage } from './types';

const DIGEST_PATTERN = /^[a-z0-9]+:[a-f0-9]{32,}$/;
const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

/**
 * A first path component is a registry host when it contains a dot or a port, or is localhost.
 */
function looksLikeRegistry(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Parse `[registry/]repository[:tag][@digest]`.
 */
export function parseBaseImage(ref: string): Result<BaseImage> {
  const trimmed = ref.trim();
  if (!trimmed) {
    return Failure('Base image reference is empty');
  }
  if (/\s/.test(trimmed)) {
    return Failure(`Base image reference contains whitespace: ${ref}`);
  }

  let remainder = trimmed;
  let digest: string | undefined;
  const at = remainder.indexOf('@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST_PATTERN.test(digest)) {
      return Failure(`Invalid digest in base image reference: ${digest}`);
    }
  }

  let tag: string | undefined;
  const lastSlash = remainder.lastIndexOf('/');
  const lastColon = remainder.lastIndexOf(':');
  if (lastColon > lastSlash) {
    tag = remainder.slice(lastColon + 1);
    remainder = remainder.slice(0, lastColon);
    if (!TAG_PATTERN.test(tag)) {
      return Failure(`Invalid tag in base image reference: ${tag}`);
    }
  }

  const components = remainder.split('/');
  let registry: string | undefined;
  const first = components[0];
  if (components.length > 1 && first !== undefined && looksLikeRegistry(first)) {
    registry = first;
    components.shift();
  }

  if (components.length === 0 || !components.every((c) => PATH_COMPONENT_PATTERN.test(c))) {
    return Failure(`Invalid repository in base image reference: ${ref}`);
  }

  const image: BaseImage = { ref: trimmed, repository: components.join('/') };
  if (registry) image.registry = registry;
  if (tag) image.tag = tag;
  if (digest) image.digest = digest;
  return Success(image);
}

/**
 * Canonical string form of a parsed reference.
 */
export function formatBaseImage(image: BaseImage): string {
  let ref = image.registry ? `${image.registry}/${image.repository}` : image.repository;
  if (image.tag) ref += `:${image.tag}`;
  if (image.digest) ref += `@${image.digest}`;
  return ref;
}

/**
 * True when the reference is not pinned to a tag other than `latest` or to a digest.
 */
export function isUnpinned(image: BaseImage): boolean {
  if (image.digest) return false;
  return image.tag === undefined || image.tag === 'latest';
}
