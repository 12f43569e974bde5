// src/modules/question/providers/movie-catalog.interface.ts

export interface CatalogMovie {
  id: number;
  title: string;
  releaseDate: string | null;
}

export interface MovieCatalog {
  randomMovie(): Promise<CatalogMovie>;
  /** Returns `count` backdrop images, or null when the movie has fewer. */
  backdrops(movieId: number, count: number): Promise<Buffer[] | null>;
}
