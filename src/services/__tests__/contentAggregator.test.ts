import { beforeEach, describe, expect, it } from "vitest";
import {
  aggregateNoteContent,
  formatNote,
  resolveNotesById,
} from "../contentAggregator";
import { InMemoryNoteRepository } from "../../test/InMemoryNoteRepository";
import { NoContentFoundError, NoteNotFoundError } from "../../errors";

describe("aggregateNoteContent", () => {
  let repo: InMemoryNoteRepository;

  beforeEach(async () => {
    repo = new InMemoryNoteRepository();
    await repo.create("Mitochondria produce ATP.");
    await repo.create("Ribosomes build proteins.");
    await repo.create("The nucleus stores DNA.");
  });

  it("fetches all notes newest first when no ids are given", async () => {
    const content = await aggregateNoteContent(repo, []);

    expect(content).toBe(
      "Note 3: The nucleus stores DNA.\n\n---\n\n" +
        "Note 2: Ribosomes build proteins.\n\n---\n\n" +
        "Note 1: Mitochondria produce ATP."
    );
  });

  it("keeps the requested order for explicit ids", async () => {
    const content = await aggregateNoteContent(repo, [1, 3]);

    expect(content).toBe(
      "Note 1: Mitochondria produce ATP.\n\n---\n\nNote 3: The nucleus stores DNA."
    );
  });

  it("skips ids that cannot be resolved", async () => {
    repo.failingIds.add(2);

    const content = await aggregateNoteContent(repo, [42, 2, 1]);

    expect(content).toBe("Note 1: Mitochondria produce ATP.");
  });

  it("fails with NoContentFound when no id resolves", async () => {
    await expect(aggregateNoteContent(repo, [98, 99])).rejects.toBeInstanceOf(
      NoContentFoundError
    );
  });

  it("fails with NoContentFound when the store is empty", async () => {
    await expect(
      aggregateNoteContent(new InMemoryNoteRepository(), [])
    ).rejects.toBeInstanceOf(NoContentFoundError);
  });

  it("propagates a failure to list all notes", async () => {
    const broken = {
      getAll: async () => {
        throw new Error("database unavailable");
      },
      getById: repo.getById.bind(repo),
    };

    await expect(aggregateNoteContent(broken, [])).rejects.toThrow(
      "database unavailable"
    );
  });
});

describe("resolveNotesById", () => {
  it("collects failures instead of stopping", async () => {
    const repo = new InMemoryNoteRepository();
    await repo.create("first");

    const result = await resolveNotesById(repo, [7, 1]);

    expect(result.notes).toEqual([{ id: 1, content: "first" }]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].id).toBe(7);
    expect(result.skipped[0].error).toBeInstanceOf(NoteNotFoundError);
  });
});

describe("formatNote", () => {
  it("prefixes the content with the note id", () => {
    expect(formatNote({ id: 12, content: "Cells divide." })).toBe(
      "Note 12: Cells divide."
    );
  });
});
