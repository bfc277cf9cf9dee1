import { pgTable, varchar, text, timestamp, real, bigint, vector, index } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

/** Length of both RGB and gray embeddings */
export const EMBEDDING_DIMENSIONS = 512;

/**
 * Products table - catalog entries owning product images
 */
export const products = pgTable('products', {
  productId: varchar('product_id', { length: 255 }).primaryKey(),
  title: text('title'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type Product = typeof products.$inferSelect;

/**
 * Product images - one row per downloaded image, features filled in by the vision stages
 */
export const productImages = pgTable(
  'product_images',
  {
    imgId: varchar('img_id', { length: 255 }).primaryKey(),
    productId: varchar('product_id', { length: 255 }).references(() => products.productId),
    localPath: varchar('local_path', { length: 500 }).notNull(),
    kpBlobPath: varchar('kp_blob_path', { length: 500 }),
    phash: bigint('phash', { mode: 'number' }),
    imageUrlRemote: text('image_url_remote'),
    embRgb: vector('emb_rgb', { dimensions: EMBEDDING_DIMENSIONS }),
    embGray: vector('emb_gray', { dimensions: EMBEDDING_DIMENSIONS }),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => ({
    productIdIdx: index('idx_product_images_product_id').on(table.productId),
  })
);

export type ProductImage = typeof productImages.$inferSelect;
export type NewProductImage = typeof productImages.$inferInsert;

/**
 * Videos table - source videos of extracted keyframes
 */
export const videos = pgTable('videos', {
  videoId: varchar('video_id', { length: 255 }).primaryKey(),
  platform: varchar('platform', { length: 50 }).notNull(),
  url: text('url').notNull(),
  title: text('title'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type Video = typeof videos.$inferSelect;

/**
 * Video frames - keyframes selected from a video
 */
export const videoFrames = pgTable(
  'video_frames',
  {
    frameId: varchar('frame_id', { length: 255 }).primaryKey(),
    videoId: varchar('video_id', { length: 255 }).references(() => videos.videoId),
    ts: real('ts').notNull(),
    localPath: varchar('local_path', { length: 500 }).notNull(),
    kpBlobPath: varchar('kp_blob_path', { length: 500 }),
    embRgb: vector('emb_rgb', { dimensions: EMBEDDING_DIMENSIONS }),
    embGray: vector('emb_gray', { dimensions: EMBEDDING_DIMENSIONS }),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => ({
    videoIdIdx: index('idx_video_frames_video_id').on(table.videoId),
  })
);

export type VideoFrame = typeof videoFrames.$inferSelect;
export type NewVideoFrame = typeof videoFrames.$inferInsert;

// Relations
export const productsRelations = relations(products, ({ many }) => ({
  images: many(productImages),
}));

export const productImagesRelations = relations(productImages, ({ one }) => ({
  product: one(products, {
    fields: [productImages.productId],
    references: [products.productId],
  }),
}));

export const videosRelations = relations(videos, ({ many }) => ({
  frames: many(videoFrames),
}));

export const videoFramesRelations = relations(videoFrames, ({ one }) => ({
  video: one(videos, {
    fields: [videoFrames.videoId],
    references: [videos.videoId],
  }),
}));
