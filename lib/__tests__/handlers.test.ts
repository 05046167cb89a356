// lib/__tests__/handlers.test.ts
import { handleClassify, handleProcess } from '../handlers';
import { BestMatchSelector } from '../bestMatch';
import type { ClassificationServices } from '../classifyProduct';
import { CommodityCodeIndex } from '../commodityCodes';
import { ProductClassifier } from '../productClassifier';
import { FakeCompletionClient, reply } from '../__fixtures__/fakeCompletionClient';

const ROWS = [
  { hs_code: '847160', code: '8471606000', description: 'Keyboards' },
  { hs_code: '847160', code: '8471607000', description: 'Other input units, including mice' }
];

/**
 * Real services wired to fake LLM providers.
 * `primary` answers type + description, `source` answers the HS code, `matcher` picks.
 */
function servicesWith(primary: FakeCompletionClient, source: FakeCompletionClient, matcher: FakeCompletionClient) {
  const services: ClassificationServices = {
    classifier: new ProductClassifier({
      client: primary,
      model: 'primary-model',
      sources: [{ name: 'openai', client: source, model: 'source-model' }]
    }),
    commodityCodes: new CommodityCodeIndex(ROWS),
    selector: new BestMatchSelector({ client: matcher, model: 'match-model', temperature: 0.5, maxTokens: 500 })
  };
  return () => services;
}

function happyServices(matchText = 'The best match is 8471607000, which covers mice.') {
  return servicesWith(
    new FakeCompletionClient([reply('Computer peripheral'), reply('Plastic housing, optical sensor')]),
    new FakeCompletionClient([reply('HS code 8471.60')]),
    new FakeCompletionClient([reply(matchText)])
  );
}

describe('handlers.ts', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe('handleProcess', () => {
    it('rejects other methods', async () => {
      expect(await handleProcess('GET', undefined, happyServices())).toEqual({
        status: 405,
        body: { error: 'Method not allowed' }
      });
    });

    it('rejects a blank product name', async () => {
      expect(await handleProcess('POST', { product_name: '   ' }, happyServices())).toEqual({
        status: 400,
        body: { error: 'Please enter a valid product name.' }
      });
      expect(await handleProcess('POST', {}, happyServices())).toEqual({
        status: 400,
        body: { error: 'Please enter a valid product name.' }
      });
    });

    it('returns the full product_info payload', async () => {
      const result = await handleProcess('POST', { product_name: '  wireless mouse ' }, happyServices());

      expect(result).toEqual({
        status: 200,
        body: {
          product_info: {
            name: 'wireless mouse',
            type: 'Computer peripheral',
            information: 'Plastic housing, optical sensor',
            matching_commodity_info: [
              ['8471606000', 'Keyboards'],
              ['8471607000', 'Other input units, including mice']
            ],
            best_commodity_code: '8471607000',
            best_commodity_reasoning: 'The best match is 8471607000, which covers mice.',
            hs_codes: ['847160'],
            sources: { openai: ['847160'] }
          }
        }
      });
    });

    it('reports a classification failure as 400', async () => {
      const getServices = servicesWith(
        new FakeCompletionClient([new Error('Network down')]),
        new FakeCompletionClient(),
        new FakeCompletionClient()
      );

      expect(await handleProcess('POST', { product_name: 'wireless mouse' }, getServices)).toEqual({
        status: 400,
        body: { error: 'Error processing product information.' }
      });
    });

    it('turns an upstream best-match failure into a generic 500', async () => {
      const getServices = servicesWith(
        new FakeCompletionClient([reply('Computer peripheral'), reply('Plastic')]),
        new FakeCompletionClient([reply('847160')]),
        new FakeCompletionClient([new Error('401 Invalid API key')])
      );

      expect(await handleProcess('POST', { product_name: 'wireless mouse' }, getServices)).toEqual({
        status: 500,
        body: { error: 'Internal server error' }
      });
    });

    it('turns a configuration failure into a generic 500', async () => {
      const getServices = (): ClassificationServices => {
        throw new Error('Cannot read configuration file');
      };

      const result = await handleProcess('POST', { product_name: 'wireless mouse' }, getServices);

      expect(result.status).toBe(500);
    });
  });

  describe('handleClassify', () => {
    it('requires product_name', async () => {
      expect(await handleClassify('POST', {}, happyServices())).toEqual({
        status: 400,
        body: { error: 'Product name is required' }
      });
      expect(await handleClassify('POST', { product_name: 42 }, happyServices())).toEqual({
        status: 400,
        body: { error: 'Product name is required' }
      });
    });

    it('rejects an empty product_name', async () => {
      expect(await handleClassify('POST', { product_name: ' ' }, happyServices())).toEqual({
        status: 400,
        body: { error: 'Product name cannot be empty' }
      });
    });

    it('returns the chosen code with its description', async () => {
      expect(await handleClassify('POST', { product_name: 'wireless mouse' }, happyServices())).toEqual({
        status: 200,
        body: {
          commodity_code: '8471607000',
          description: 'Other input units, including mice',
          reasoning: 'The best match is 8471607000, which covers mice.'
        }
      });
    });

    it('returns a null description when no code was chosen', async () => {
      const result = await handleClassify(
        'POST',
        { product_name: 'wireless mouse' },
        happyServices('Neither description fits.')
      );

      expect(result).toEqual({
        status: 200,
        body: { commodity_code: null, description: null, reasoning: 'Neither description fits.' }
      });
    });

    it('returns 404 when no commodity code sits under the HS codes', async () => {
      const getServices = servicesWith(
        new FakeCompletionClient([reply('Coffee'), reply('Roasted beans')]),
        new FakeCompletionClient([reply('0901.21')]),
        new FakeCompletionClient()
      );

      expect(await handleClassify('POST', { product_name: 'coffee beans' }, getServices)).toEqual({
        status: 404,
        body: { error: 'No matching commodity code found' }
      });
    });

    it('includes the error message in a 500', async () => {
      const getServices = servicesWith(
        new FakeCompletionClient([reply('Computer peripheral'), reply('Plastic')]),
        new FakeCompletionClient([reply('847160')]),
        new FakeCompletionClient([new Error('429 Rate limit reached')])
      );

      expect(await handleClassify('POST', { product_name: 'wireless mouse' }, getServices)).toEqual({
        status: 500,
        body: { error: 'Internal server error: 429 Rate limit reached' }
      });
    });
  });
});
