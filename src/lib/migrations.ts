import type { DeleteBehavior, ModelField, ModelSchema, SqlDialect } from './model.js';
import { qualifiedTable, sqlTypeName } from './model.js';

const ON_DELETE: Record<DeleteBehavior, string> = {
  ignore: '',
  restrict: ' ON DELETE RESTRICT',
  cascade: ' ON DELETE CASCADE',
  set_null: ' ON DELETE SET NULL',
  set_default: ' ON DELETE SET DEFAULT',
};

// SQLite has no schemas, so tables are addressed by bare name there.
function tableName(target: { schema: string; table: string }, dialect: SqlDialect): string {
  return dialect === 'sqlite' ? target.table : qualifiedTable(target);
}

function columnDefault(field: ModelField, dialect: SqlDialect): string {
  if (dialect === 'sqlite' && field.default.toLowerCase() === 'now()') {
    return 'CURRENT_TIMESTAMP';
  }
  return field.default;
}

function columnDefinition(model: ModelSchema, field: ModelField, dialect: SqlDialect): string {
  let output = `${field.sqlName} ${sqlTypeName(field.type, dialect)}`;

  if (!field.nullable) {
    output += ' NOT NULL';
  }
  if (!model.join && field.fixed && field.sqlName === 'id') {
    output += ' PRIMARY KEY';
  }
  if (field.default) {
    output += ` DEFAULT ${columnDefault(field, dialect)}`;
  }
  if (field.unique) {
    output += ' UNIQUE';
  }
  if (field.references) {
    const { references } = field;
    output += ` REFERENCES ${tableName(references, dialect)} (${references.field})`;
    output += ON_DELETE[references.onDelete];
  }
  if (field.extraSqlModifiers) {
    output += ` ${field.extraSqlModifiers}`;
  }

  return output;
}

/**
 * `CREATE TABLE` statement for a model, followed by its index statements.
 */
export function generateUpMigration(model: ModelSchema, dialect: SqlDialect = 'postgresql'): string {
  const table = tableName(model, dialect);
  const lines = model.fields.map(field => `  ${columnDefinition(model, field, dialect)}`);

  if (model.join) {
    lines.push(`  PRIMARY KEY (${model.join.modelIds.join(', ')})`);
  }

  let output = `CREATE TABLE ${table} (\n${lines.join(',\n')}\n);\n`;

  const indexes = model.fields
    .filter(field => field.indexed && !field.unique)
    .map(field => `CREATE INDEX ${model.table}_${field.sqlName} ON ${table} (${field.sqlName});`);

  for (const statement of model.indexes) {
    const trimmed = statement.trim();
    indexes.push(trimmed.endsWith(';') ? trimmed : `${trimmed};`);
  }

  if (indexes.length > 0) {
    output += `\n${indexes.join('\n')}\n`;
  }

  return output;
}

export function generateDownMigration(model: ModelSchema, dialect: SqlDialect = 'postgresql'): string {
  return `DROP TABLE IF EXISTS ${tableName(model, dialect)};\n`;
}
