import { beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";
import { POST } from "./route";

function upload(file?: File) {
  const form = new FormData();
  if (file) form.append("file", file);
  else form.append("note", "no file attached");
  return POST(new NextRequest("http://localhost/api/upload", { method: "POST", body: form }));
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("POST /api/upload", () => {
  it("extracts learning points from a text file", async () => {
    const text = "AAAA\nThis is a properly formed sentence about photosynthesis that exceeds thirty characters.\n";
    const res = await upload(new File([text], "notes.txt", { type: "text/plain" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      fileName: "notes.txt",
      kind: "plain-text",
      unitCount: 2,
      learningPoints: ["This is a properly formed sentence about photosynthesis that exceeds thirty characters."],
    });
  });

  it("rejects unsupported file types", async () => {
    const res = await upload(new File([new Uint8Array([137, 80, 78, 71])], "scan.png", { type: "image/png" }));
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: "Unsupported file type: image/png", code: "UNSUPPORTED_FORMAT" });
  });

  it("treats an empty document as a failed extraction", async () => {
    const res = await upload(new File([""], "empty.txt", { type: "text/plain" }));
    expect(res.status).toBe(422);
    expect((await res.json()).code).toBe("EXTRACTION_ERROR");
  });

  it("reports documents with nothing worth asking about", async () => {
    const res = await upload(new File(["Title\nToo short\n"], "short.txt", { type: "text/plain" }));
    expect(res.status).toBe(422);
    expect((await res.json()).code).toBe("NO_LEARNING_POINTS");
  });

  it("needs a file", async () => {
    const res = await upload();
    expect(res.status).toBe(400);
  });
});
