export type ComponentType =
  | 'WORKFLOW'
  | 'ACTIVITY_WASM'
  | 'ACTIVITY_STUB'
  | 'ACTIVITY_EXTERNAL'
  | 'WEBHOOK_ENDPOINT';

export interface ComponentId {
  componentType: ComponentType;
  name: string;
  digest: string;
}

const COMPONENT_TYPES: readonly ComponentType[] = [
  'WORKFLOW',
  'ACTIVITY_WASM',
  'ACTIVITY_STUB',
  'ACTIVITY_EXTERNAL',
  'WEBHOOK_ENDPOINT',
];

function isComponentType(value: string): value is ComponentType {
  return COMPONENT_TYPES.some((type) => type === value);
}

/** `TYPE:name:digest` */
export function formatComponentId(componentId: ComponentId): string {
  return `${componentId.componentType}:${componentId.name}:${componentId.digest}`;
}

/** Inverse of formatComponentId; the digest may itself contain colons. */
export function parseComponentId(input: string): ComponentId | undefined {
  const first = input.indexOf(':');
  if (first === -1) return undefined;
  const second = input.indexOf(':', first + 1);
  if (second === -1) return undefined;
  const componentType = input.slice(0, first);
  if (!isComponentType(componentType)) return undefined;
  return {
    componentType,
    name: input.slice(first + 1, second),
    digest: input.slice(second + 1),
  };
}
