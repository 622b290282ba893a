const ADDRESS_PATTERN = /^([A-Za-z][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_-]*)$/;

/** A resource address in state and configuration: `<type>.<name>` */
export interface Address {
  type: string;
  name: string;
}

export function parseAddress(address: string): Address {
  const match = ADDRESS_PATTERN.exec(address);
  if (!match) throw new Error(`Invalid resource address "${address}": expected <type>.<name>`);
  return { type: match[1], name: match[2] };
}

export function formatAddress({ type, name }: Address): string {
  return `${type}.${name}`;
}
