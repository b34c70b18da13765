import { Option, Schema } from "effect";
import * as Primitives from "./primitives";

/** Opaque block identifier, a UUID string for every block but genesis */
export const BlockIdSchema = Schema.String.pipe(Schema.brand("BlockId"));
export type BlockId = typeof BlockIdSchema.Type;

export const BlockSchema = Schema.Struct({
  // distance from genesis, only meaningful relative to a chain
  height: Primitives.NonNegativeIntSchema,
  // `None` only for genesis
  parentId: Schema.Option(BlockIdSchema),
  id: BlockIdSchema,
});

export type Block = typeof BlockSchema.Type;

export const makeBlockId = BlockIdSchema.make;
export const makeBlock = BlockSchema.make;

export const GENESIS_ID = makeBlockId("00000000-0000-0000-0000-000000000000");

/** Shared root of every chain, identical across nodes and runs */
export const genesis: Block = makeBlock({
  height: 0,
  parentId: Option.none(),
  id: GENESIS_ID,
});

/** Whether `block` directly extends `parent` (height and parent link) */
export const extendsBlock = (block: Block, parent: Block): boolean =>
  block.height === parent.height + 1 &&
  Option.exists(block.parentId, (id) => id === parent.id);
