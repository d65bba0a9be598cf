/**
 * Tests for the library card scanner
 */
import { readFileSync } from "fs";
import { describe, it, expect } from "vitest";
import { MarkupScanner, scanLibraryHtml } from "../src/scanner/index.js";
import { EmptyInputError } from "../src/errors.js";

const libraryHtml = readFileSync(
  new URL("./fixtures/library.html", import.meta.url),
  "utf-8"
);

function card(inner: string, attrs = 'href="#/detail/movie/tt100"'): string {
  return `<a class="meta-item-container" ${attrs}>${inner}</a>`;
}

describe("scanLibraryHtml", () => {
  it("extracts every recognized card in document order", () => {
    const entities = scanLibraryHtml(libraryHtml);

    expect(entities.map((e) => e.identifier)).toEqual([
      "tt1234567",
      "tt7654321",
      "tt1111111",
    ]);
  });

  it("reads a movie card with watched marker and background poster", () => {
    const [movie] = scanLibraryHtml(libraryHtml);

    expect(movie).toEqual({
      identifier: "tt1234567",
      kind: "movie",
      href: "#/detail/movie/tt1234567",
      displayTitle: "Example Film",
      watched: true,
      progressPercent: 0,
      posterUrl: "https://images.example.org/poster one.jpg",
      posterShape: "poster",
      dataAttributes: { "data-id": "tt1234567", "data-type": "movie" },
    });
  });

  it("reads an episode card with progress and nested labels", () => {
    const episode = scanLibraryHtml(libraryHtml)[1];

    expect(episode).toEqual({
      identifier: "tt7654321",
      kind: "show",
      href: "#/detail/series/tt7654321:2:5",
      displayTitle: "Example Series",
      season: 2,
      episode: 5,
      watched: false,
      progressPercent: 45.5,
      posterUrl: "https://images.example.org/series/cover.jpg",
      episodeTitle: "The Long Night",
      releaseInfoText: "2019",
      year: 2019,
      durationText: "42 min",
      dataAttributes: {},
    });
  });

  it("joins text split around character references", () => {
    const show = scanLibraryHtml(libraryHtml)[2];

    expect(show.displayTitle).toBe("Another & Show");
    expect(show.progressPercent).toBe(95);
    expect(show.kind).toBe("show");
  });

  it("throws EmptyInputError for blank documents", () => {
    expect(() => scanLibraryHtml("")).toThrow(EmptyInputError);
    expect(() => scanLibraryHtml("  \n\t ")).toThrow(EmptyInputError);
  });

  it("returns an empty list when no card is present", () => {
    expect(scanLibraryHtml("<html><body><p>Library</p></body></html>")).toEqual(
      []
    );
  });

  it("ignores marker links whose target is not a detail link", () => {
    const html =
      card("", 'href="#/discover"') +
      card("", 'href="#/detail/movie/abc123"') +
      '<a href="#/detail/movie/tt5">no marker</a>';

    expect(scanLibraryHtml(html)).toEqual([]);
  });

  it("omits fields that were never discovered", () => {
    const [entity] = scanLibraryHtml(card("<span>plain</span>"));

    expect(Object.keys(entity)).toEqual([
      "identifier",
      "kind",
      "href",
      "watched",
      "progressPercent",
      "dataAttributes",
    ]);
    expect(entity.progressPercent).toBe(0);
  });

  it("freezes finalized entities", () => {
    const [entity] = scanLibraryHtml(card(""));

    expect(Object.isFrozen(entity)).toBe(true);
    expect(Object.isFrozen(entity.dataAttributes)).toBe(true);
  });

  it("copies only data attributes from the card root", () => {
    const [entity] = scanLibraryHtml(
      card(
        '<div data-inner="no"></div>',
        'href="#/detail/movie/tt100" data-slot="3" id="card-3" data-empty=""'
      )
    );

    expect(entity.dataAttributes).toEqual({ "data-slot": "3", "data-empty": "" });
  });

  describe("titles", () => {
    it("prefers the title attribute over image alt and label text", () => {
      const [entity] = scanLibraryHtml(
        card(
          '<img src="p.jpg" alt="Alt Title"><div class="title-label">Label Title</div>',
          'href="#/detail/movie/tt100" title="Attribute Title"'
        )
      );

      expect(entity.displayTitle).toBe("Attribute Title");
    });

    it("keeps the first of image alt and label text", () => {
      const [altFirst] = scanLibraryHtml(
        card('<img src="p.jpg" alt="Alt Title"><div class="name">Label</div>')
      );
      const [labelFirst] = scanLibraryHtml(
        card('<div class="name">Label</div><img src="p.jpg" alt="Alt Title">')
      );

      expect(altFirst.displayTitle).toBe("Alt Title");
      expect(labelFirst.displayTitle).toBe("Label");
    });

    it("treats an empty title attribute as absent", () => {
      const [entity] = scanLibraryHtml(
        card(
          '<div class="title">From Label</div>',
          'href="#/detail/movie/tt100" title=""'
        )
      );

      expect(entity.displayTitle).toBe("From Label");
    });
  });

  describe("progress", () => {
    it("matches progress bars case-insensitively and clamps to 100", () => {
      const [entity] = scanLibraryHtml(
        card('<div class="ProgressBar_fill" style="width:120%"></div>')
      );

      expect(entity.progressPercent).toBe(100);
    });

    it("keeps the default when the width is not a number", () => {
      const [entity] = scanLibraryHtml(
        card('<div class="progress-bar" style="width: .%"></div>')
      );

      expect(entity.progressPercent).toBe(0);
    });

    it("lets a later progress bar overwrite an earlier one", () => {
      const [entity] = scanLibraryHtml(
        card(
          '<div class="progress-bar" style="width: 10%"></div>' +
            '<div class="progress-bar" style="width: 60%"></div>'
        )
      );

      expect(entity.progressPercent).toBe(60);
    });
  });

  describe("posters", () => {
    it("keeps the first poster background image", () => {
      const [entity] = scanLibraryHtml(
        card(
          "<div class=\"poster\" style=\"background-image: url('https://x.test/first.jpg')\"></div>" +
            "<div class=\"thumbnail\" style=\"background-image: url('https://x.test/second.jpg')\"></div>"
        )
      );

      expect(entity.posterUrl).toBe("https://x.test/first.jpg");
    });

    it("does not let an img replace a poster that is already set", () => {
      const [entity] = scanLibraryHtml(
        card(
          '<div class="poster" style="background-image: url(https://x.test/bg.jpg)"></div>' +
            '<img src="https://x.test/img.jpg">'
        )
      );

      expect(entity.posterUrl).toBe("https://x.test/bg.jpg");
    });

    it("falls back to any inline background image", () => {
      const [entity] = scanLibraryHtml(
        card(
          "<section style=\"background-image: url('https://x.test/a%20b.jpg')\"></section>"
        )
      );

      expect(entity.posterUrl).toBe("https://x.test/a b.jpg");
    });

    it("reads the poster shape from the class list", () => {
      const [entity] = scanLibraryHtml(
        card('<div class="poster-image poster-shape-landscape"></div>')
      );

      expect(entity.posterShape).toBe("landscape");
      expect(entity.posterUrl).toBeUndefined();
    });
  });

  describe("text capture", () => {
    it("routes text by the last matching class rule", () => {
      const [entity] = scanLibraryHtml(
        card(
          '<div class="episode-title">Pilot</div>' +
            '<span class="runtime-label">55 min</span>' +
            '<p class="release-date">March 2008</p>'
        )
      );

      expect(entity.episodeTitle).toBe("Pilot");
      expect(entity.durationText).toBe("55 min");
      expect(entity.releaseInfoText).toBe("March 2008");
      expect(entity.year).toBe(2008);
      expect(entity.displayTitle).toBeUndefined();
    });

    it("stops capturing when a nested text element closes", () => {
      const [entity] = scanLibraryHtml(
        card('<div class="release-info"><span>2001</span> tail</div>')
      );

      expect(entity.releaseInfoText).toBe("2001");
      expect(entity.year).toBe(2001);
    });

    it("keeps release text without a standalone year", () => {
      const [entity] = scanLibraryHtml(
        card('<div class="year">Season 12019</div>')
      );

      expect(entity.releaseInfoText).toBe("Season 12019");
      expect(entity.year).toBeUndefined();
    });

    it("ignores classed text outside of cards", () => {
      const entities = scanLibraryHtml(
        '<div class="title">Outside</div>' + card("")
      );

      expect(entities[0].displayTitle).toBeUndefined();
    });
  });

  describe("card boundaries", () => {
    it("keeps scanning the card after a nested link closes", () => {
      const [entity] = scanLibraryHtml(
        card('<a href="#/other">inner</a><div class="watched-icon-layer"></div>')
      );

      expect(entity.watched).toBe(true);
    });

    it("ignores a nested card marker while a card is open", () => {
      const entities = scanLibraryHtml(
        card(
          '<a class="meta-item-container" href="#/detail/movie/tt200"></a>' +
            '<div class="title-label">Outer</div>'
        )
      );

      expect(entities).toHaveLength(1);
      expect(entities[0].identifier).toBe("tt100");
      expect(entities[0].displayTitle).toBe("Outer");
    });

    it("treats a stray closing link as a no-op", () => {
      const entities = scanLibraryHtml("</a></div>" + card("") + "</a>");

      expect(entities).toHaveLength(1);
    });

    it("finalizes a card left open at the end of the document", () => {
      const entities = scanLibraryHtml(
        '<a class="meta-item-container" href="#/detail/movie/tt42"><div class="title-label">Late'
      );

      expect(entities).toHaveLength(1);
      expect(entities[0].displayTitle).toBe("Late");
    });
  });

  describe("MarkupScanner", () => {
    it("produces identical output from independent instances", () => {
      const first = new MarkupScanner().scan(libraryHtml);
      const second = new MarkupScanner().scan(libraryHtml);

      expect(second).toEqual(first);
    });

    it("starts from a clean state on every scan", () => {
      const scanner = new MarkupScanner();
      scanner.scan(libraryHtml);

      const entities = scanner.scan(card(""));

      expect(entities).toHaveLength(1);
      expect(entities[0].identifier).toBe("tt100");
    });
  });
});
