import { validate } from './env.validation';

describe('validate', () => {
  it('fills in defaults for an empty environment', () => {
    const env = validate({});

    expect(env.SQLITE_PATH).toBe('db.sqlite');
    expect(env.OPENSEARCH_URL).toBe('http://127.0.0.1:9200');
    expect(env.OPENSEARCH_INDEX).toBe('movies');
    expect(env.OPENSEARCH_CREATE_INDEX).toBe('false');
    expect(env.OPENSEARCH_USERNAME).toBeUndefined();
  });

  it('keeps explicit values', () => {
    const env = validate({
      SQLITE_PATH: '/data/movies.sqlite',
      OPENSEARCH_URL: 'https://search.internal:9200',
      OPENSEARCH_INDEX: 'films',
      OPENSEARCH_CREATE_INDEX: 'true',
    });

    expect(env.SQLITE_PATH).toBe('/data/movies.sqlite');
    expect(env.OPENSEARCH_URL).toBe('https://search.internal:9200');
    expect(env.OPENSEARCH_INDEX).toBe('films');
    expect(env.OPENSEARCH_CREATE_INDEX).toBe('true');
  });

  it('rejects a target that is not a url', () => {
    expect(() => validate({ OPENSEARCH_URL: 'not a url' })).toThrow(
      /Invalid environment: OPENSEARCH_URL/,
    );
  });

  it('rejects a non-boolean index bootstrap flag', () => {
    expect(() => validate({ OPENSEARCH_CREATE_INDEX: 'sometimes' })).toThrow(
      /OPENSEARCH_CREATE_INDEX/,
    );
  });
});
