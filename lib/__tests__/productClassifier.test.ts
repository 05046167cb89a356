// lib/__tests__/productClassifier.test.ts
import { CLASSIFICATION_RULE_UNAVAILABLE, ProductClassifier } from '../productClassifier';
import { setTestFlags } from '../flags';
import { FakeCompletionClient, reply } from '../__fixtures__/fakeCompletionClient';

describe('productClassifier.ts', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    setTestFlags({ classificationRule: false });
  });

  function classifierWith(primary: FakeCompletionClient, sourceReplies: Record<string, FakeCompletionClient>) {
    return new ProductClassifier({
      client: primary,
      model: 'primary-model',
      sources: Object.entries(sourceReplies).map(([name, client]) => ({ name, client, model: `${name}-model` }))
    });
  }

  describe('generateProductInfo', () => {
    it('combines type, description and codes from every source', async () => {
      const primary = new FakeCompletionClient([
        reply('Computer peripheral: input device'),
        reply('  Plastic housing, optical sensor, 2.4 GHz receiver.  ')
      ]);
      const openai = new FakeCompletionClient([reply('The HS code is 8471.60.')]);
      const claude = new FakeCompletionClient([reply('I would suggest 847160 or perhaps 85176200.')]);

      const result = await classifierWith(primary, { openai, claude }).generateProductInfo('wireless mouse');

      expect(result).toEqual({
        name: 'wireless mouse',
        type: 'Computer peripheral: input device',
        information: 'Plastic housing, optical sensor, 2.4 GHz receiver.',
        hsCodes: ['847160', '851762'],
        sources: { openai: ['847160'], claude: ['847160', '851762'] }
      });
    });

    it('sends the product prompts to the primary model', async () => {
      const primary = new FakeCompletionClient([reply('Peripheral'), reply('Plastic')]);
      const openai = new FakeCompletionClient([reply('847160')]);

      await classifierWith(primary, { openai }).generateProductInfo('wireless mouse');

      expect(primary.requests[0]).toEqual({
        model: 'primary-model',
        messages: [
          { role: 'system', content: 'You are an expert in product classification.' },
          { role: 'user', content: 'What is the product type and category for wireless mouse?' }
        ],
        temperature: 0.5,
        maxTokens: 200
      });
      expect(primary.requests[1].messages[1].content).toBe(
        'Provide detailed information about wireless mouse, including material composition, primary use, and distinctive features.'
      );
      expect(openai.requests[0].model).toBe('openai-model');
      expect(openai.requests[0].messages[1].content).toBe(
        'Based on the HS Nomenclature 2017 edition, provide the most specific 6-digit HS code classification for Peripheral and Plastic.'
      );
    });

    it('keeps going when one source fails', async () => {
      const primary = new FakeCompletionClient([reply('Peripheral'), reply('Plastic')]);
      const openai = new FakeCompletionClient([reply('847160')]);
      const groq = new FakeCompletionClient([new Error('429 Too Many Requests')]);

      const result = await classifierWith(primary, { openai, groq }).generateProductInfo('wireless mouse');

      expect(result?.hsCodes).toEqual(['847160']);
      expect(result?.sources).toEqual({ openai: ['847160'], groq: [] });
      expect(errorSpy).toHaveBeenCalledWith('[ProductClassifier] ❌ Error getting groq HS codes:', '429 Too Many Requests');
    });

    it('returns null when the product type cannot be generated', async () => {
      const primary = new FakeCompletionClient([new Error('Network down')]);

      const result = await classifierWith(primary, {}).generateProductInfo('wireless mouse');

      expect(result).toBeNull();
    });

    it('returns null when the primary model answers with no choices', async () => {
      const primary = new FakeCompletionClient([reply()]);

      expect(await classifierWith(primary, {}).generateProductInfo('wireless mouse')).toBeNull();
    });

    it('adds the classification rule when enabled', async () => {
      setTestFlags({ classificationRule: true });
      const primary = new FakeCompletionClient([reply('Peripheral'), reply('Plastic'), reply('Rule 1 applies.')]);
      const openai = new FakeCompletionClient([reply('847160')]);

      const result = await classifierWith(primary, { openai }).generateProductInfo('wireless mouse');

      expect(result?.classificationRule).toBe('Rule 1 applies.');
      expect(primary.requests[2].messages).toHaveLength(1);
    });

    it('falls back to a fixed message when the rule request fails', async () => {
      setTestFlags({ classificationRule: true });
      const primary = new FakeCompletionClient([reply('Peripheral'), reply('Plastic'), new Error('timeout')]);
      const openai = new FakeCompletionClient([reply('847160')]);

      const result = await classifierWith(primary, { openai }).generateProductInfo('wireless mouse');

      expect(result?.classificationRule).toBe(CLASSIFICATION_RULE_UNAVAILABLE);
    });

    it('skips the rule when no HS codes were found', async () => {
      setTestFlags({ classificationRule: true });
      const primary = new FakeCompletionClient([reply('Peripheral'), reply('Plastic')]);
      const openai = new FakeCompletionClient([reply('I am not sure.')]);

      const result = await classifierWith(primary, { openai }).generateProductInfo('wireless mouse');

      expect(result?.hsCodes).toEqual([]);
      expect(result?.classificationRule).toBeUndefined();
      expect(primary.requests).toHaveLength(2);
    });
  });
});
