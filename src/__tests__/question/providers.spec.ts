import { describe, expect, it, vi } from "vitest";
import { ExhaustedSourceError } from "../../errors";
import type { MovieCatalog } from "../../modules/question/providers/movie-catalog.interface";
import {
  MOVIE_SOURCE_NAME,
  MovieBackdropProvider,
} from "../../modules/question/providers/movie-backdrop.provider";
import { TmdbCatalog } from "../../modules/question/providers/tmdb.catalog";
import { TriviaBankProvider } from "../../modules/question/providers/trivia-bank.provider";
import {
  readSeedFile,
  SAMPLE_TRIVIA_PATH,
  seedTriviaBank,
} from "../../modules/question/providers/trivia-bank.seed";
import type {
  NewTriviaBankEntry,
  TriviaBankEntry,
  TriviaBankStore,
} from "../../modules/question/providers/trivia-bank.store";

class FakeBank implements TriviaBankStore {
  readonly entries: NewTriviaBankEntry[] = [];

  async randomEntry(): Promise<TriviaBankEntry | null> {
    const entry = this.entries[0];
    if (!entry) return null;
    return { ...entry, id: 1, media: entry.media ?? [] };
  }

  async size(): Promise<number> {
    return this.entries.length;
  }

  async add(entry: NewTriviaBankEntry): Promise<number> {
    this.entries.push(entry);
    return this.entries.length;
  }
}

describe("TriviaBankProvider", () => {
  it("turns a bank entry into a question", async () => {
    const bank = new FakeBank();
    await bank.add({
      question: "What is the capital of Portugal?",
      answer: "Lisbon",
      category: "Geography",
      difficulty: "easy",
    });

    const drawn = await new TriviaBankProvider(bank).getRandomQuestion();

    expect(drawn).toEqual({
      text: "What is the capital of Portugal?",
      answer: "Lisbon",
      media: [],
      category: "Geography",
      sourceMetadata: { questionId: 1, difficulty: "easy" },
    });
  });

  it("is exhausted when the bank is empty", async () => {
    await expect(new TriviaBankProvider(new FakeBank()).getRandomQuestion()).rejects.toBeInstanceOf(
      ExhaustedSourceError
    );
  });

  it("scores answers with the fuzzy matcher", () => {
    const provider = new TriviaBankProvider(new FakeBank());
    expect(provider.evaluateAnswer("lisbonn", "Lisbon", 80)).toBe(86);
    expect(provider.answerLabel).toBe("answer");
  });
});

describe("seedTriviaBank", () => {
  it("reads every row of the sample file", async () => {
    const rows = await readSeedFile(SAMPLE_TRIVIA_PATH);
    expect(rows).toHaveLength(20);
    expect(rows[0]).toEqual({
      question: "What is the capital of Portugal?",
      answer: "Lisbon",
      category: "Geography",
      difficulty: "medium",
    });
  });

  it("fills an empty bank once", async () => {
    const bank = new FakeBank();
    expect(await seedTriviaBank(bank)).toBe(20);
    expect(await seedTriviaBank(bank)).toBe(0);
    expect(await bank.size()).toBe(20);
  });
});

describe("MovieBackdropProvider", () => {
  const movie = { id: 42, title: "The Matrix", releaseDate: "1999-03-31" };

  function catalog(backdrops: Array<Buffer[] | null>): MovieCatalog {
    return {
      randomMovie: vi.fn(async () => movie),
      backdrops: vi.fn(async () => backdrops.shift() ?? null),
    };
  }

  it("skips movies without enough backdrops", async () => {
    const images = [Buffer.from("a"), Buffer.from("b"), Buffer.from("c"), Buffer.from("d")];
    const source = catalog([null, images]);

    const drawn = await new MovieBackdropProvider(source).getRandomQuestion();

    expect(source.backdrops).toHaveBeenCalledTimes(2);
    expect(source.backdrops).toHaveBeenLastCalledWith(42, 4);
    expect(drawn.answer).toBe("The Matrix");
    expect(drawn.media).toHaveLength(4);
    expect(drawn.media[0]).toEqual({
      bytes: Buffer.from("a"),
      mimeType: "image/jpeg",
      altText: "Censored still from the movie",
    });
    expect(drawn.sourceMetadata).toEqual({ movieId: 42, releaseDate: "1999-03-31" });
  });

  it("gives up after its attempt budget", async () => {
    const provider = new MovieBackdropProvider(catalog([]), 3);
    await expect(provider.getRandomQuestion()).rejects.toMatchObject({
      sourceName: MOVIE_SOURCE_NAME,
    });
  });

  it("reports catalogue failures as exhaustion", async () => {
    const source: MovieCatalog = {
      randomMovie: vi.fn(async () => {
        throw new Error("rate limited");
      }),
      backdrops: vi.fn(async () => null),
    };
    await expect(new MovieBackdropProvider(source).getRandomQuestion()).rejects.toBeInstanceOf(
      ExhaustedSourceError
    );
  });

  it("labels the answer as a movie and needs image preparation", () => {
    const provider = new MovieBackdropProvider(catalog([]));
    expect(provider.answerLabel).toBe("movie");
    expect(provider.requiresImageProcessing).toBe(true);
    expect(provider.maxMediaItems).toBe(4);
  });
});

describe("TmdbCatalog", () => {
  function jsonResponse(body: unknown): Response {
    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { "content-type": "application/json" },
    });
  }

  it("picks a movie from a discover page", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        results: [
          { id: 1, title: "Alien", release_date: "1979-05-25" },
          { id: "bad" },
          { id: 2, title: "Heat" },
        ],
      })
    );
    const tmdb = new TmdbCatalog("test-key", fetchFn, () => 0.99);

    expect(await tmdb.randomMovie()).toEqual({ id: 2, title: "Heat", releaseDate: null });
    expect(fetchFn).toHaveBeenCalledWith(
      "https://api.themoviedb.org/3/discover/movie?sort_by=popularity.desc&include_adult=false&page=50&api_key=test-key"
    );
  });

  it("returns null when a movie has too few backdrops", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ backdrops: [{ file_path: "/one.jpg" }] })
    );
    const tmdb = new TmdbCatalog("test-key", fetchFn, () => 0);

    expect(await tmdb.backdrops(7, 2)).toBeNull();
  });

  it("downloads the requested backdrops", async () => {
    const fetchFn = vi.fn<typeof fetch>(async (input) => {
      const url = String(input);
      if (url.includes("/images?")) {
        return jsonResponse({
          backdrops: [{ file_path: "/one.jpg" }, { file_path: "/two.jpg" }],
        });
      }
      return new Response(url.endsWith("/one.jpg") ? "first" : "second");
    });
    const tmdb = new TmdbCatalog("test-key", fetchFn, () => 0);

    const images = await tmdb.backdrops(7, 2);

    expect(images?.map((image) => image.toString())).toEqual(["first", "second"]);
    expect(fetchFn).toHaveBeenCalledWith("https://image.tmdb.org/t/p/w780/one.jpg");
  });

  it("fails on an error status", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("nope", { status: 401 }));
    const tmdb = new TmdbCatalog("test-key", fetchFn, () => 0);

    await expect(tmdb.randomMovie()).rejects.toThrow("failed with 401");
  });
});
