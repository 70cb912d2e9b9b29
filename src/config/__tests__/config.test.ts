import { loadConfig } from '../index';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      datasetPath: 'data/sample-dataset.json',
      ranking: { viewsImportance: 0.5, topN: 1 },
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ PORT: '', DATASET_PATH: '', RANK_VIEWS_IMPORTANCE: '', RANK_TOP_N: '' })).toEqual({
      port: 3000,
      datasetPath: 'data/sample-dataset.json',
      ranking: { viewsImportance: 0.5, topN: 1 },
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATASET_PATH: '/srv/graph.json',
      RANK_VIEWS_IMPORTANCE: '0.2',
      RANK_TOP_N: '5',
    });

    expect(config).toEqual({
      port: 8080,
      datasetPath: '/srv/graph.json',
      ranking: { viewsImportance: 0.2, topN: 5 },
    });
  });

  it('should name the invalid variable', () => {
    expect(() => loadConfig({ RANK_VIEWS_IMPORTANCE: '2' })).toThrow(/RANK_VIEWS_IMPORTANCE/);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
  });
});
