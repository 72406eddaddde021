import { name, OllamaAdapter, FakeAdapter, executeProviderRequest } from './index';

describe('adapters package', () => {
  it('exports its name and adapters', () => {
    expect(name).toBe('@taskplanner/adapters');
    expect(new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'llama2' }).id()).toBe(
      'ollama',
    );
    expect(new FakeAdapter().id()).toBe('fake');
    expect(typeof executeProviderRequest).toBe('function');
  });
});
