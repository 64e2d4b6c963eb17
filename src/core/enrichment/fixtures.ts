/**
 * @arch testsmith.core.domain
 *
 * Canned fixture templates. One parameterless fixture per dependency
 * category, plus sample-data fixtures for complex parameters.
 */
import type { FixtureSpec } from '../model/types.js';
import type { DependencyCategory } from '../dependencies/vocabulary.js';
import type { ComplexShape } from '../synthesis/type-resolver.js';

/** Categories that map to a fixture; the rest only get mocks. */
export type FixtureCategory = Extract<DependencyCategory, 'storage' | 'network' | 'session' | 'filesystem' | 'data'>;

type FixtureTemplate = Omit<FixtureSpec, 'origin' | 'scope'>;

const CATEGORY_TEMPLATES: Record<FixtureCategory, FixtureTemplate> = {
  storage: {
    name: 'database_fixture',
    setup: [
      'connection = unittest.mock.MagicMock()',
      'connection.cursor.return_value = unittest.mock.MagicMock()',
    ],
    value: 'connection',
    teardown: ['connection.close()'],
    dependencies: ['unittest.mock'],
    docstring: 'Mock database connection.',
  },
  network: {
    name: 'client_fixture',
    setup: [
      'client = unittest.mock.MagicMock()',
      'client.get.return_value = unittest.mock.MagicMock(status_code=200)',
      'client.post.return_value = unittest.mock.MagicMock(status_code=201)',
    ],
    value: 'client',
    teardown: [],
    dependencies: ['unittest.mock'],
    docstring: 'Mock HTTP client.',
  },
  session: {
    name: 'session_fixture',
    setup: [
      'session = unittest.mock.MagicMock()',
      "session.user_id = 'test-user'",
      "session.token = 'test-token'",
      'session.is_authenticated = True',
    ],
    value: 'session',
    teardown: [],
    dependencies: ['unittest.mock'],
    docstring: 'Mock authenticated session.',
  },
  filesystem: {
    name: 'temp_file_fixture',
    setup: [
      "handle = tempfile.NamedTemporaryFile(mode='w', suffix='.txt', delete=False)",
      "handle.write('test content')",
      'handle.close()',
    ],
    value: 'handle.name',
    teardown: ['if os.path.exists(handle.name):', '    os.unlink(handle.name)'],
    dependencies: ['os', 'tempfile'],
    docstring: 'Temporary file removed after the test.',
  },
  data: {
    name: 'mock_data_fixture',
    setup: [],
    value: "{'id': 1, 'name': 'test', 'values': [1, 2, 3]}",
    teardown: [],
    dependencies: [],
    docstring: 'Sample structured data.',
  },
};

const SHAPE_VALUES: Record<ComplexShape, string> = {
  mapping: "{'id': 1, 'name': 'test', 'active': True}",
  sequence: '[1, 2, 3]',
  tabular: "[{'id': 1, 'value': 'a'}, {'id': 2, 'value': 'b'}]",
};

export function isFixtureCategory(category: DependencyCategory): category is FixtureCategory {
  return category in CATEGORY_TEMPLATES;
}

export function categoryFixture(category: FixtureCategory): FixtureSpec {
  const template = CATEGORY_TEMPLATES[category];
  return {
    ...template,
    setup: [...template.setup],
    teardown: [...template.teardown],
    dependencies: [...template.dependencies],
    scope: 'function',
    origin: 'category',
  };
}

/**
 * `<param>_data` fixture for a mapping, sequence or tabular parameter.
 */
export function parameterDataFixture(
  parameterName: string,
  shape: ComplexShape,
  name = `${parameterName}_data`
): FixtureSpec {
  return {
    name,
    scope: 'function',
    setup: [],
    value: SHAPE_VALUES[shape],
    teardown: [],
    dependencies: [],
    docstring: `Sample ${shape} data for ${parameterName}.`,
    origin: 'parameter',
    parameter: parameterName,
  };
}
