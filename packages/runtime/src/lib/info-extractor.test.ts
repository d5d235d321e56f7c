import type { FieldKey } from '../types/index.js';
import { ExtractionError } from './errors.js';
import { InfoExtractor } from './info-extractor.js';
import type { StructuredExtractor } from './language-model.js';
import { createEmptyProfile, createProfile, type FieldUpdate } from './lead-profile.js';

class FakeStructuredExtractor implements StructuredExtractor {
  calls: Array<readonly FieldKey[]> = [];

  constructor(private respond: () => Promise<FieldUpdate>) {}

  extract(_utterance: string, missingFields: readonly FieldKey[]): Promise<FieldUpdate> {
    this.calls.push(missingFields);
    return this.respond();
  }
}

describe('InfoExtractor', () => {
  const extractor = new InfoExtractor();

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('extractDeterministic', () => {
    it('should extract name and company from an introduction', () => {
      const result = extractor.extractDeterministic("Hi, I'm Jane from Acme");
      expect(result.fields).toEqual({ name: 'Jane', company: 'Acme' });
    });

    it('should extract a full name and a multi-word company', () => {
      const result = extractor.extractDeterministic('My name is Jane Doe and I work at Acme Corp.');
      expect(result.fields).toEqual({ name: 'Jane Doe', company: 'Acme Corp' });
    });

    it('should extract a role title', () => {
      const result = extractor.extractDeterministic("I'm the CTO at Acme");
      expect(result.fields).toEqual({ role: 'CTO' });
    });

    it('should not treat filler words as names', () => {
      const result = extractor.extractDeterministic("I'm Looking for a CRM");
      expect(result.fields).toEqual({ need: 'a CRM' });
    });

    it('should extract a need and a pain point from one message', () => {
      const result = extractor.extractDeterministic(
        'We need a better way to track leads because our biggest problem is lost follow-ups.'
      );
      expect(result.fields).toEqual({
        need: 'a better way to track leads',
        pain_point: 'lost follow-ups',
      });
    });

    it('should extract a budget when the message talks about budget', () => {
      const result = extractor.extractDeterministic('Our budget is around $50k for this.');
      expect(result.fields).toEqual({ budget: '$50k' });
    });

    it('should ignore a bare amount with no budget context', () => {
      const result = extractor.extractDeterministic('Probably $200');
      expect(result.fields).toEqual({});
    });

    it('should extract an amount that answers a budget question', () => {
      const result = extractor.extractDeterministic('Probably around 20,000 USD', {
        lastAssistantTurn: 'Do you have a budget in mind?',
      });
      expect(result.fields).toEqual({ budget: '20,000 USD' });
    });

    it('should put an email in contact details, not in fields', () => {
      const result = extractor.extractDeterministic('You can reach me at jane.doe@example.com');
      expect(result.fields).toEqual({});
      expect(result.contact).toEqual({ email: 'jane.doe@example.com' });
    });

    it('should format US phone numbers', () => {
      const result = extractor.extractDeterministic('Call me at (555) 234-5678');
      expect(result.contact).toEqual({ phone: '(555) 234-5678' });
    });

    it('should extract relative timelines', () => {
      expect(extractor.extractDeterministic("We'd like it in place within 3 months").fields)
        .toEqual({ timeline: 'within 3 months' });
      expect(extractor.extractDeterministic('Ideally by Q3').fields).toEqual({ timeline: 'Q3' });
    });

    it('should extract product interest unless negated', () => {
      expect(extractor.extractDeterministic("I'm interested in the Growth plan").fields)
        .toEqual({ product_interest: 'Growth plan' });
      expect(extractor.extractDeterministic("I'm not interested in the Growth plan").fields).toEqual({});
    });

    it('should not take a year or a place for a company', () => {
      expect(extractor.extractDeterministic("We've been doing this from 2019").fields).toEqual({});
      expect(extractor.extractDeterministic("I'm calling from New York").fields).toEqual({});
    });

    it('should not take a capitalised adjective for a name', () => {
      expect(extractor.extractDeterministic("I'm Ready to buy").fields).toEqual({});
    });

    it('should only pair an amount with a budget cue next to it', () => {
      expect(extractor.extractDeterministic('We have 10k users and the budget is tight').fields).toEqual({});
      expect(extractor.extractDeterministic('We have 10k users and a $5k budget').fields).toEqual({ budget: '$5k' });
    });

    it('should return nothing for an empty message', () => {
      expect(extractor.extractDeterministic('   ')).toEqual({ fields: {}, contact: {} });
    });
  });

  describe('extract', () => {
    it('should skip the model when none is configured', async () => {
      const result = await extractor.extract("Hi, I'm Jane from Acme", createEmptyProfile());

      expect(result.fields).toEqual({ name: 'Jane', company: 'Acme' });
      expect(result.sources).toEqual({ name: 'pattern', company: 'pattern' });
      expect(result.modelStatus).toBe('skipped');
    });

    it('should ask the model only for fields still missing', async () => {
      const model = new FakeStructuredExtractor(async () => ({ name: 'Janet', role: 'CTO', budget: '' }));
      const withModel = new InfoExtractor({ structuredExtractor: model });

      const result = await withModel.extract("Hi, I'm Jane from Acme", createEmptyProfile());

      expect(model.calls).toEqual([['role', 'need', 'pain_point', 'budget', 'timeline', 'product_interest']]);
      expect(result.fields).toEqual({ name: 'Jane', company: 'Acme', role: 'CTO' });
      expect(result.sources).toEqual({ name: 'pattern', company: 'pattern', role: 'model' });
      expect(result.modelStatus).toBe('ok');
    });

    it('should leave out values identical to the current profile', async () => {
      const result = await extractor.extract("I'm Jane from Acme", createProfile({ fields: { name: 'Jane' } }));
      expect(result.fields).toEqual({ company: 'Acme' });
    });

    it('should return the pattern result when the model fails', async () => {
      const model = new FakeStructuredExtractor(async () => {
        throw new ExtractionError('malformed');
      });
      const withModel = new InfoExtractor({ structuredExtractor: model });

      const result = await withModel.extract("Hi, I'm Jane from Acme", createEmptyProfile());

      expect(result.fields).toEqual({ name: 'Jane', company: 'Acme' });
      expect(result.modelStatus).toBe('failed');
    });

    it('should give up on a model that does not answer in time', async () => {
      const model = new FakeStructuredExtractor(() => new Promise<FieldUpdate>(() => undefined));
      const withModel = new InfoExtractor({ structuredExtractor: model, timeoutMs: 20 });

      const result = await withModel.extract("Hi, I'm Jane from Acme", createEmptyProfile());

      expect(result.fields).toEqual({ name: 'Jane', company: 'Acme' });
      expect(result.modelStatus).toBe('timeout');
    });

    it('should keep a captured company when a place is mentioned later', async () => {
      const profile = createProfile({ fields: { name: 'Jane', company: 'Acme' } });

      const result = await extractor.extract("I'm calling from New York", profile);

      expect(result.fields).toEqual({});
      expect(result.modelStatus).toBe('skipped');
    });

    it('should not call the model when every field is known', async () => {
      const model = new FakeStructuredExtractor(async () => ({}));
      const withModel = new InfoExtractor({ structuredExtractor: model });
      const profile = createProfile({
        fields: {
          name: 'Jane',
          company: 'Acme',
          role: 'CTO',
          need: 'a CRM',
          pain_point: 'spreadsheets',
          budget: '$5k',
          timeline: 'Q3',
          product_interest: 'Growth plan',
        },
      });

      const result = await withModel.extract('Sounds good', profile);

      expect(model.calls).toEqual([]);
      expect(result.modelStatus).toBe('skipped');
    });
  });
});
