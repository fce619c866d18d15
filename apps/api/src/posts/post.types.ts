export interface PostRecord {
  id: string;
  authorId: string;
  title: string;
  slug: string;
  content: string;
  coverImageUrl: string;
  isPublished: boolean;
  publishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type PostPatch = Partial<Omit<PostRecord, "id" | "authorId" | "createdAt">>;

export interface CommentRecord {
  id: string;
  authorId: string;
  /** Free-form kind of the commented item, e.g. `post` or `challenge`. */
  targetType: string;
  targetId: string;
  parentId: string | null;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export type CommentPatch = Partial<Pick<CommentRecord, "content" | "updatedAt">>;
