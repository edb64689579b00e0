import {
  OperationNodeTransformer,
  type KyselyPlugin,
  type PluginTransformQueryArgs,
  type PluginTransformResultArgs,
  type PrimitiveValueListNode,
  type ValueNode,
} from 'kysely';

/**
 * better-sqlite3 refuses to bind booleans and undefined. Booleans are stored
 * as 0/1 integers and undefined binds as NULL; other values pass through.
 */
export function toSqliteParameter(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value ?? null;
}

class ParameterTransformer extends OperationNodeTransformer {
  protected override transformValue(node: ValueNode): ValueNode {
    return { ...super.transformValue(node), value: toSqliteParameter(node.value) };
  }

  protected override transformPrimitiveValueList(node: PrimitiveValueListNode): PrimitiveValueListNode {
    return { ...super.transformPrimitiveValueList(node), values: node.values.map(toSqliteParameter) };
  }
}

/**
 * Rewrites query parameters with `toSqliteParameter`, raw `sql` fragments
 * included. Result rows are returned untouched; decoding 0/1 back into
 * booleans is left to the caller, which knows the column types.
 */
export class BooleanParameterPlugin implements KyselyPlugin {
  private readonly transformer = new ParameterTransformer();

  transformQuery(args: PluginTransformQueryArgs): PluginTransformQueryArgs['node'] {
    return this.transformer.transformNode(args.node, args.queryId);
  }

  transformResult(args: PluginTransformResultArgs): Promise<PluginTransformResultArgs['result']> {
    return Promise.resolve(args.result);
  }
}
