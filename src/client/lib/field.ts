import { UsageError } from './errors';
import { JsonObject, JsonValue } from './json';

/**
 * Field types of the default Solr configset used by the factories, plus any custom type name
 */
export type SolrFieldType =
  | 'string'
  | 'strings'
  | 'lowercase'
  | 'text_general'
  | 'pint'
  | 'plong'
  | 'pfloat'
  | 'pdouble'
  | 'boolean'
  | 'pdate'
  | 'delimited_payloads_string'
  | (string & {});

/**
 * Optional field properties, sent only when set.
 * See https://solr.apache.org/guide/solr/latest/indexing-guide/fields.html
 */
export interface OptionalFieldProperties {
  default?: JsonValue;
  docValues?: boolean;
  sortMissingFirst?: boolean;
  sortMissingLast?: boolean;
  uninvertible?: boolean;
  omitNorms?: boolean;
  omitTermFreqAndPositions?: boolean;
  omitPositions?: boolean;
  termVectors?: boolean;
  termPositions?: boolean;
  termOffsets?: boolean;
  termPayloads?: boolean;
  required?: boolean;
  useDocValuesAsStored?: boolean;
  large?: boolean;
}

export interface FieldProperties extends OptionalFieldProperties {
  name: string;
  type: SolrFieldType;
  indexed: boolean;
  stored: boolean;
  multiValued: boolean;
}

type BooleanProperty = {
  [K in keyof OptionalFieldProperties]-?: OptionalFieldProperties[K] extends boolean | undefined
    ? K
    : never;
}[keyof OptionalFieldProperties];

const OPTIONAL_KEYS: ReadonlyArray<keyof OptionalFieldProperties> = [
  'default',
  'docValues',
  'sortMissingFirst',
  'sortMissingLast',
  'uninvertible',
  'omitNorms',
  'omitTermFreqAndPositions',
  'omitPositions',
  'termVectors',
  'termPositions',
  'termOffsets',
  'termPayloads',
  'required',
  'useDocValuesAsStored',
  'large',
];

/**
 * Immutable description of one schema field.
 *
 * Every modifier returns a new descriptor and leaves the receiver untouched.
 */
export class FieldDescriptor {
  private readonly properties: Readonly<FieldProperties>;

  constructor(properties: FieldProperties) {
    if (!properties.name) {
      throw new UsageError('Field name must not be empty');
    }
    if (!properties.type) {
      throw new UsageError(`Field "${properties.name}" has no type`);
    }
    this.properties = Object.freeze({ ...properties });
  }

  get name(): string {
    return this.properties.name;
  }

  get type(): SolrFieldType {
    return this.properties.type;
  }

  get isIndexed(): boolean {
    return this.properties.indexed;
  }

  get isStored(): boolean {
    return this.properties.stored;
  }

  get isMultiValued(): boolean {
    return this.properties.multiValued;
  }

  /**
   * All properties, including the optional ones that were set
   */
  get definition(): Readonly<FieldProperties> {
    return this.properties;
  }

  indexed(indexed: boolean): FieldDescriptor {
    return this.with({ indexed });
  }

  stored(stored: boolean): FieldDescriptor {
    return this.with({ stored });
  }

  multiValued(multiValued: boolean): FieldDescriptor {
    return this.with({ multiValued });
  }

  defaultValue(value: JsonValue): FieldDescriptor {
    return this.with({ default: value });
  }

  docValues(enabled: boolean): FieldDescriptor {
    return this.flag('docValues', enabled);
  }

  required(required: boolean): FieldDescriptor {
    return this.flag('required', required);
  }

  omitNorms(omit: boolean): FieldDescriptor {
    return this.flag('omitNorms', omit);
  }

  omitTermFreqAndPositions(omit: boolean): FieldDescriptor {
    return this.flag('omitTermFreqAndPositions', omit);
  }

  omitPositions(omit: boolean): FieldDescriptor {
    return this.flag('omitPositions', omit);
  }

  termVectors(enabled: boolean): FieldDescriptor {
    return this.flag('termVectors', enabled);
  }

  termPositions(enabled: boolean): FieldDescriptor {
    return this.flag('termPositions', enabled);
  }

  termOffsets(enabled: boolean): FieldDescriptor {
    return this.flag('termOffsets', enabled);
  }

  termPayloads(enabled: boolean): FieldDescriptor {
    return this.flag('termPayloads', enabled);
  }

  sortMissingFirst(enabled: boolean): FieldDescriptor {
    return this.flag('sortMissingFirst', enabled);
  }

  sortMissingLast(enabled: boolean): FieldDescriptor {
    return this.flag('sortMissingLast', enabled);
  }

  uninvertible(enabled: boolean): FieldDescriptor {
    return this.flag('uninvertible', enabled);
  }

  useDocValuesAsStored(enabled: boolean): FieldDescriptor {
    return this.flag('useDocValuesAsStored', enabled);
  }

  large(enabled: boolean): FieldDescriptor {
    return this.flag('large', enabled);
  }

  /**
   * Field definition in the shape the Schema API expects
   */
  toJSON(): JsonObject {
    const { name, type, indexed, stored, multiValued } = this.properties;
    const json: JsonObject = { name, type, indexed, stored, multiValued };
    for (const key of OPTIONAL_KEYS) {
      const value = this.properties[key];
      if (value !== undefined) {
        json[key] = value;
      }
    }
    return json;
  }

  private flag(key: BooleanProperty, value: boolean): FieldDescriptor {
    const changes: Partial<FieldProperties> = {};
    changes[key] = value;
    return this.with(changes);
  }

  private with(changes: Partial<FieldProperties>): FieldDescriptor {
    return new FieldDescriptor({ ...this.properties, ...changes });
  }
}

/**
 * Factories for field descriptors with the default indexing flags
 * (indexed, stored, single valued) and a fixed Solr type.
 *
 * @example
 * ```typescript
 * users.schema()
 *   .addField(FieldBuilder.string('name'))
 *   .addField(FieldBuilder.numeric('age').docValues(true))
 *   .commit();
 * ```
 */
export class FieldBuilder {
  /**
   * Descriptor of any field type
   * @param name Field name
   * @param type Name of a field type defined in the collection's schema
   */
  static of(name: string, type: SolrFieldType): FieldDescriptor {
    return new FieldDescriptor({ name, type, indexed: true, stored: true, multiValued: false });
  }

  static string(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'string').omitNorms(true);
  }

  static multiString(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'strings').omitNorms(true).multiValued(true);
  }

  /** Case-insensitive keyword field */
  static text(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'lowercase');
  }

  /** Tokenized full-text field */
  static fulltext(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'text_general');
  }

  static numeric(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'pfloat');
  }

  static int(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'pint');
  }

  static long(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'plong');
  }

  static double(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'pdouble');
  }

  static boolean(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'boolean');
  }

  static date(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'pdate');
  }

  static tag(name: string): FieldDescriptor {
    return FieldBuilder.of(name, 'delimited_payloads_string');
  }
}
