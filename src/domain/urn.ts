/**
 * URN syntax for linked projects and version links.
 */

const URN_PATTERN = /^urn:([a-z0-9-]{0,31}):([a-z0-9()+,\-.:=@;$_!*'%/?#]+)$/i;

export function isUrn(value: string): boolean {
  return URN_PATTERN.test(value);
}
