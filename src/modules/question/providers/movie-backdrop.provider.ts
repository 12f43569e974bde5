// src/modules/question/providers/movie-backdrop.provider.ts
import { ExhaustedSourceError } from "../../../errors";
import type { Question } from "../question.entity";
import { BaseQuestionProvider } from "../question-provider.interface";
import type { CatalogMovie, MovieCatalog } from "./movie-catalog.interface";

export const MOVIE_SOURCE_NAME = "Movie Trivia";

export class MovieBackdropProvider extends BaseQuestionProvider {
  readonly requiresImageProcessing = true;
  readonly maxMediaItems = 4;
  readonly answerLabel = "movie";

  constructor(
    private readonly catalog: MovieCatalog,
    private readonly maxAttempts = 10
  ) {
    super();
  }

  getSourceName(): string {
    return MOVIE_SOURCE_NAME;
  }

  async getRandomQuestion(): Promise<Question> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const { movie, backdrops } = await this.pickMovie();
      // Movies with too few backdrops are skipped.
      if (!backdrops) continue;

      return {
        text: "Can you guess the movie title from these images?",
        answer: movie.title,
        media: backdrops.map((bytes) => ({
          bytes,
          mimeType: "image/jpeg",
          altText: "Censored still from the movie",
        })),
        category: "Movies",
        sourceMetadata: { movieId: movie.id, releaseDate: movie.releaseDate },
      };
    }
    throw new ExhaustedSourceError(this.getSourceName());
  }

  private async pickMovie(): Promise<{ movie: CatalogMovie; backdrops: Buffer[] | null }> {
    try {
      const movie = await this.catalog.randomMovie();
      const backdrops = await this.catalog.backdrops(movie.id, this.maxMediaItems);
      return { movie, backdrops };
    } catch (error) {
      throw new ExhaustedSourceError(this.getSourceName(), error);
    }
  }
}
