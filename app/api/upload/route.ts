import { NextRequest, NextResponse } from "next/server";
import { ExtractionError, UnsupportedFormatError } from "@/lib/errors";
import { errorResponse } from "@/lib/http";
import { extractText, resolveDocumentKind } from "@/lib/extract";
import { cleanAndSplit } from "@/lib/sentences";
import type { UploadResult } from "@/lib/types";

export async function POST(req: NextRequest) {
  try {
    const formData = await req.formData();
    const file = formData.get("file");

    if (!file || typeof file === "string") {
      return NextResponse.json({ error: "No file uploaded" }, { status: 400 });
    }

    const kind = resolveDocumentKind(file.type, file.name);
    const bytes = new Uint8Array(await file.arrayBuffer());
    const { text, unitCount, error } = await extractText({ kind, bytes, name: file.name }, file.type);

    if (error instanceof UnsupportedFormatError) return errorResponse(error, 415);
    if (error) return errorResponse(error, 422);
    if (!text.trim()) {
      return errorResponse(new ExtractionError("Failed to extract text from the document. Please check the file format."), 422);
    }

    const learningPoints = cleanAndSplit(text);
    if (!learningPoints.length) {
      return NextResponse.json(
        { error: "No valid learning points found in the document. Please try a different file.", code: "NO_LEARNING_POINTS" },
        { status: 422 }
      );
    }

    const result: UploadResult = { fileName: file.name, kind, unitCount, learningPoints };
    return NextResponse.json(result);
  } catch (error) {
    console.error("Upload error:", error);
    return NextResponse.json(
      { error: "Failed to process file: " + (error instanceof Error ? error.message : "Unknown error") },
      { status: 500 }
    );
  }
}
