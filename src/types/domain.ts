// This file defines the tool, schema, and signature model shared by the registry, binder, and invoker.

export type SchemaTypeTag = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

// This interface describes one published tool argument as the catalog declares it.
export interface ParameterSchema {
  name: string;
  type: SchemaTypeTag;
  required: boolean;
  description?: string;
  default?: unknown;
  enum?: string[];
  format?: string;
  properties?: Record<string, ParameterSchema>;
  items?: ParameterSchema;
  // Annotations carry source metadata (query/body/header/route) and are never interpreted.
  annotations?: Record<string, unknown>;
}

export interface EnumMember {
  name: string;
  value: string | number;
}

// This union describes the declared type of one formal parameter or structured field.
export type TypeDescriptor =
  | { kind: 'string' }
  | { kind: 'integer' }
  | { kind: 'number' }
  | { kind: 'boolean' }
  | { kind: 'unknown' }
  | { kind: 'enum'; name: string; members: EnumMember[] }
  | { kind: 'object'; name: string; fields: ParameterDescriptor[]; create?: (fields: Record<string, unknown>) => unknown }
  | { kind: 'array'; items: TypeDescriptor }
  | { kind: 'opaque'; name: string };

export type TypeKind = TypeDescriptor['kind'];

// This interface describes one formal parameter in declaration order.
export interface ParameterDescriptor {
  name: string;
  type: TypeDescriptor;
  hasDefault: boolean;
  defaultValue?: unknown;
  description?: string;
}

// Any class fits regardless of its constructor parameters; instances are built through Reflect.construct.
export type HandlerType<T = unknown> = new (...args: never[]) => T;

export type HandlerFunction = (args: readonly unknown[]) => unknown;

// This interface abstracts one invokable method so the registry never stores raw functions.
export interface Callable {
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly isStatic: boolean;
  resolve(instance: unknown): HandlerFunction;
}

export interface HandlerIdentity {
  name: string;
  type?: HandlerType;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  handler: HandlerIdentity;
  method: Callable;
  schema: ReadonlyMap<string, ParameterSchema>;
}

// This interface is one externally supplied catalog row used for bulk registry imports.
export interface CatalogEntry {
  name: string;
  description?: string;
  handlerIdentity: string;
  methodName: string;
  parameterSchema: ParameterSchema[];
}

export interface CatalogProvider {
  listTools(): CatalogEntry[] | Promise<CatalogEntry[]>;
}

export interface MethodDefinition {
  parameters: ParameterDescriptor[];
  isStatic?: boolean;
  description?: string;
  toolName?: string | false;
}

// This interface binds a handler identity to its class and the method signatures it exposes.
export interface HandlerDefinition {
  name: string;
  type: HandlerType;
  methods: Record<string, MethodDefinition>;
}

export interface HandlerLocator {
  locate(identity: string): HandlerDefinition | undefined;
}

export type BindingFailureKind = 'missing_required' | 'type_mismatch' | 'schema_missing' | 'internal';

export interface BindingFailure {
  kind: BindingFailureKind;
  parameter: string;
  message: string;
  expectedType?: string;
}

export type BindingResult = { ok: true; args: unknown[] } | { ok: false; failure: BindingFailure };

export type OutputFormat = 'raw' | 'content';
