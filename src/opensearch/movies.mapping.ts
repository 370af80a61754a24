const person = {
  type: 'nested',
  dynamic: 'strict',
  properties: {
    id: { type: 'keyword' },
    name: { type: 'text' },
  },
};

export const MOVIES_INDEX_BODY: Record<string, unknown> = {
  mappings: {
    dynamic: 'strict',
    properties: {
      id: { type: 'keyword' },
      title: { type: 'text', fields: { raw: { type: 'keyword' } } },
      description: { type: 'text' },
      genre: { type: 'keyword' },
      director: { type: 'text' },
      imdb_rating: { type: 'float' },
      writers: person,
      writers_names: { type: 'text' },
      actors: person,
      actors_names: { type: 'text' },
    },
  },
};
