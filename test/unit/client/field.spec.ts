import { FieldBuilder, FieldDescriptor } from '../../../src/client/lib/field';
import { UsageError } from '../../../src/client/lib/errors';

describe('FieldBuilder', () => {
  describe('factories', () => {
    it('should build a string field with the default flags', () => {
      const field = FieldBuilder.string('name');

      expect(field.name).toBe('name');
      expect(field.type).toBe('string');
      expect(field.isIndexed).toBe(true);
      expect(field.isStored).toBe(true);
      expect(field.isMultiValued).toBe(false);
      expect(field.toJSON()).toEqual({
        name: 'name',
        type: 'string',
        indexed: true,
        stored: true,
        multiValued: false,
        omitNorms: true,
      });
    });

    it('should build a multi-valued string field', () => {
      expect(FieldBuilder.multiString('tags').toJSON()).toEqual({
        name: 'tags',
        type: 'strings',
        indexed: true,
        stored: true,
        multiValued: true,
        omitNorms: true,
      });
    });

    it.each([
      ['text', FieldBuilder.text, 'lowercase'],
      ['fulltext', FieldBuilder.fulltext, 'text_general'],
      ['numeric', FieldBuilder.numeric, 'pfloat'],
      ['int', FieldBuilder.int, 'pint'],
      ['long', FieldBuilder.long, 'plong'],
      ['double', FieldBuilder.double, 'pdouble'],
      ['boolean', FieldBuilder.boolean, 'boolean'],
      ['date', FieldBuilder.date, 'pdate'],
      ['tag', FieldBuilder.tag, 'delimited_payloads_string'],
    ])('should map %s to the %s Solr type', (_label, factory, type) => {
      expect(factory('field').toJSON()).toEqual({
        name: 'field',
        type,
        indexed: true,
        stored: true,
        multiValued: false,
      });
    });

    it('should accept a custom field type', () => {
      expect(FieldBuilder.of('location', 'location').type).toBe('location');
    });

    it('should reject an empty name or type', () => {
      expect(() => FieldBuilder.string('')).toThrow(UsageError);
      expect(() => FieldBuilder.of('broken', '')).toThrow('Field "broken" has no type');
    });
  });

  describe('modifiers', () => {
    it('should return a modified copy and leave the original untouched', () => {
      const original = FieldBuilder.numeric('age');
      const hidden = original.stored(false);

      expect(hidden).not.toBe(original);
      expect(hidden).toBeInstanceOf(FieldDescriptor);
      expect(hidden.isStored).toBe(false);
      expect(original.isStored).toBe(true);
    });

    it('should chain overrides', () => {
      const field = FieldBuilder.date('birthday').indexed(false).multiValued(true).required(true);

      expect(field.isIndexed).toBe(false);
      expect(field.isMultiValued).toBe(true);
      expect(field.definition.required).toBe(true);
    });

    it('should only serialize optional properties that were set', () => {
      const field = FieldBuilder.long('visits')
        .docValues(true)
        .defaultValue(0)
        .sortMissingLast(true)
        .useDocValuesAsStored(false);

      expect(field.toJSON()).toEqual({
        name: 'visits',
        type: 'plong',
        indexed: true,
        stored: true,
        multiValued: false,
        default: 0,
        docValues: true,
        sortMissingLast: true,
        useDocValuesAsStored: false,
      });
    });

    it('should support the term vector and norms flags', () => {
      const field = FieldBuilder.fulltext('bio')
        .termVectors(true)
        .termPositions(true)
        .termOffsets(true)
        .termPayloads(false)
        .omitNorms(false)
        .omitPositions(false)
        .omitTermFreqAndPositions(false)
        .uninvertible(false)
        .sortMissingFirst(false)
        .large(true);

      expect(field.definition).toMatchObject({
        termVectors: true,
        termPositions: true,
        termOffsets: true,
        termPayloads: false,
        omitNorms: false,
        omitPositions: false,
        omitTermFreqAndPositions: false,
        uninvertible: false,
        sortMissingFirst: false,
        large: true,
      });
    });

    it('should freeze its definition', () => {
      expect(Object.isFrozen(FieldBuilder.string('name').definition)).toBe(true);
    });
  });
});
