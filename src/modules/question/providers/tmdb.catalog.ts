// src/modules/question/providers/tmdb.catalog.ts
import type { CatalogMovie, MovieCatalog } from "./movie-catalog.interface";

const API_BASE = "https://api.themoviedb.org/3";
const IMAGE_BASE = "https://image.tmdb.org/t/p/w780";
const DISCOVER_PAGES = 50;

type FetchFn = typeof fetch;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export class TmdbCatalog implements MovieCatalog {
  constructor(
    private readonly apiKey: string,
    private readonly fetchFn: FetchFn = fetch,
    private readonly random: () => number = Math.random
  ) {}

  async randomMovie(): Promise<CatalogMovie> {
    const page = 1 + Math.floor(this.random() * DISCOVER_PAGES);
    const body = await this.getJson(
      `/discover/movie?sort_by=popularity.desc&include_adult=false&page=${page}`
    );
    const movies = asArray(isRecord(body) ? body.results : undefined).flatMap(
      (entry): CatalogMovie[] => {
        if (!isRecord(entry)) return [];
        const { id, title, release_date } = entry;
        if (typeof id !== "number" || typeof title !== "string") return [];
        return [
          {
            id,
            title,
            releaseDate: typeof release_date === "string" ? release_date : null,
          },
        ];
      }
    );
    if (movies.length === 0) {
      throw new Error(`TMDB discover page ${page} returned no movies`);
    }
    return movies[Math.floor(this.random() * movies.length)];
  }

  async backdrops(movieId: number, count: number): Promise<Buffer[] | null> {
    const body = await this.getJson(
      `/movie/${movieId}/images?include_image_language=null`
    );
    const paths = asArray(isRecord(body) ? body.backdrops : undefined)
      .map((entry) => (isRecord(entry) ? entry.file_path : undefined))
      .filter((path): path is string => typeof path === "string");
    if (paths.length < count) return null;

    return Promise.all(
      paths.slice(0, count).map(async (path) => {
        const response = await this.fetchFn(`${IMAGE_BASE}${path}`);
        if (!response.ok) {
          throw new Error(`TMDB image ${path} failed with ${response.status}`);
        }
        return Buffer.from(await response.arrayBuffer());
      })
    );
  }

  private async getJson(path: string): Promise<unknown> {
    const separator = path.includes("?") ? "&" : "?";
    const response = await this.fetchFn(
      `${API_BASE}${path}${separator}api_key=${encodeURIComponent(this.apiKey)}`
    );
    if (!response.ok) {
      throw new Error(`TMDB request ${path} failed with ${response.status}`);
    }
    return response.json();
  }
}
