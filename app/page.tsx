"use client";

import { useState, useRef, useEffect } from "react";
import { PREVIEW_LIMIT, QUESTION_COUNT } from "@/lib/config";
import { previewLearningPoints } from "@/lib/sentences";
import { answerQuestion, checkSubmission, emptyQuizSession, fillQuizSession, markSubmitted, resetQuizSession } from "@/lib/session";
import { NO_EXPLANATION, TIER_MESSAGES, performanceTier } from "@/lib/score";
import { parseQuizStream } from "@/lib/stream";
import type { ApiError, QuizSession, ScoreReport, UploadResult } from "@/lib/types";

type Status = { kind: "success"|"error"|"info"|"warn"; text: string } | null;

const UNIT_LABEL: Record<UploadResult["kind"], string> = {
  pdf: "pages", docx: "paragraphs", "plain-text": "lines", unsupported: "units",
};

async function readError(res: Response, fallback: string): Promise<ApiError> {
  try {
    const data: unknown = await res.json();
    if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
      const missing = "missing" in data && Array.isArray(data.missing) ? data.missing.filter((n): n is number => typeof n === "number") : undefined;
      return { error: data.error, missing };
    }
  } catch (e) {
    console.error("Unreadable error response", e);
  }
  return { error: fallback };
}

export default function Home() {
  const [hasServerKey, setHasServerKey] = useState(true);
  const [apiKey, setApiKey] = useState("");
  const [questionCount, setQuestionCount] = useState<number>(QUESTION_COUNT.default);

  const [upload, setUpload] = useState<UploadResult | null>(null);
  const [uploading, setUploading] = useState(false);
  const [uploadStatus, setUploadStatus] = useState<Status>(null);
  const [dragOver, setDragOver] = useState(false);

  const [generating, setGenerating] = useState(false);
  const [progress, setProgress] = useState({ current: 0, total: 0 });
  const [genStatus, setGenStatus] = useState<Status>(null);

  const [session, setSession] = useState<QuizSession>(emptyQuizSession);
  const [report, setReport] = useState<ScoreReport | null>(null);
  const [submitStatus, setSubmitStatus] = useState<Status>(null);
  const [grading, setGrading] = useState(false);

  const fileInputRef = useRef<HTMLInputElement>(null);

  useEffect(() => {
    fetch("/api/quiz")
      .then(res => res.json())
      .then((data: { hasServerKey?: boolean }) => setHasServerKey(Boolean(data.hasServerKey)))
      .catch(e => { console.error("Key check failed", e); setHasServerKey(false); });
  }, []);

  const canGenerate = hasServerKey || apiKey.trim().length > 0;
  const preview = upload ? previewLearningPoints(upload.learningPoints, PREVIEW_LIMIT) : null;
  const answeredCount = Object.values(session.userAnswers).filter(a => a !== null).length;

  function startNewQuiz(): QuizSession {
    const fresh = resetQuizSession();
    setSession(fresh);
    setReport(null); setSubmitStatus(null); setGenStatus(null);
    return fresh;
  }

  async function processFile(file: File) {
    if (uploading || generating) return;
    setUploading(true); setUpload(null); setUploadStatus(null); startNewQuiz();
    const formData = new FormData();
    formData.append("file", file);
    try {
      const res = await fetch("/api/upload", { method: "POST", body: formData });
      if (!res.ok) {
        const { error } = await readError(res, "Failed to extract text from the document.");
        setUploadStatus({ kind: "error", text: error });
      } else {
        const data: UploadResult = await res.json();
        setUpload(data);
        setUploadStatus({
          kind: "success",
          text: `Extracted content from ${data.unitCount} ${UNIT_LABEL[data.kind]} · found ${data.learningPoints.length} learning points`,
        });
      }
    } catch (e) {
      console.error("Upload failed", e);
      setUploadStatus({ kind: "error", text: "Error uploading file." });
    }
    setUploading(false);
  }

  function handleDrop(e: React.DragEvent) {
    e.preventDefault(); setDragOver(false);
    const file = e.dataTransfer.files?.[0];
    if (file) void processFile(file);
  }

  async function generateQuiz() {
    if (!upload || generating) return;
    const target = Math.min(questionCount, upload.learningPoints.length);
    const pending = startNewQuiz();
    setGenerating(true); setProgress({ current: 0, total: target });
    if (upload.learningPoints.length < questionCount) {
      setGenStatus({ kind: "warn", text: `Only ${upload.learningPoints.length} learning points found. Generating ${target} questions.` });
    }

    try {
      const res = await fetch("/api/quiz", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ learningPoints: upload.learningPoints, questionCount, apiKey: hasServerKey ? undefined : apiKey }),
      });
      if (!res.ok || !res.body) {
        const { error } = await readError(res, "Failed to generate quiz. Please try again.");
        setGenStatus({ kind: "error", text: error });
        setGenerating(false);
        return;
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let accumulated = "";
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        accumulated += decoder.decode(value, { stream: true });
        const { progress: p } = parseQuizStream(accumulated);
        if (p) setProgress(p);
      }

      const { result } = parseQuizStream(accumulated);
      if (!result || result.error || !result.mcqs.length) {
        setGenStatus({ kind: "error", text: result?.error ?? "Failed to generate quiz. Please try again." });
      } else {
        const { mcqs } = result;
        setSession(s => fillQuizSession(s, pending.id, mcqs));
        setGenStatus(result.failed > 0
          ? { kind: "warn", text: `Generated ${result.mcqs.length} of ${result.requested} questions. ${result.failed} could not be generated.` }
          : { kind: "success", text: `Generated ${result.mcqs.length} questions!` });
      }
    } catch (e) {
      console.error("Quiz error", e);
      setGenStatus({ kind: "error", text: "Failed to generate quiz. Please try again." });
    }
    setGenerating(false);
  }

  function selectOption(qi: number, opt: string) {
    setSession(s => answerQuestion(s, qi, opt));
    setSubmitStatus(null);
  }

  async function submitQuiz() {
    const incomplete = checkSubmission(session);
    if (incomplete) { setSubmitStatus({ kind: "warn", text: incomplete.message }); return; }

    setGrading(true);
    try {
      const res = await fetch("/api/grade", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ mcqs: session.mcqs, answers: session.userAnswers }),
      });
      if (!res.ok) {
        const { error } = await readError(res, "Grading failed.");
        setSubmitStatus({ kind: "error", text: error });
      } else {
        const data: ScoreReport = await res.json();
        setReport(data);
        setSession(markSubmitted);
      }
    } catch (e) {
      console.error("Grading failed", e);
      setSubmitStatus({ kind: "error", text: "Grading failed." });
    }
    setGrading(false);
  }

  const tier = report ? performanceTier(report.percentage) : null;

  return (
    <>
      <style>{`
        *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }
        body { background: #F7F5F0; font-family: 'DM Sans', system-ui, sans-serif; color: #1a1a1a; }
        .page { min-height: 100vh; display: flex; flex-direction: column; align-items: center; padding: 56px 24px 96px; }
        .container { width: 100%; max-width: 680px; display: flex; flex-direction: column; gap: 20px; }
        .header { text-align: center; margin-bottom: 24px; }
        .logo { font-family: Georgia, serif; font-size: 56px; line-height: 1; letter-spacing: -2px; }
        .logo em { font-style: italic; color: #5B6AF0; }
        .tagline { font-size: 15px; color: #999; margin-top: 6px; }
        .card { background: #fff; border-radius: 20px; border: 1px solid #E8E4DD; padding: 28px; box-shadow: 0 1px 12px rgba(0,0,0,0.04); }
        .card-title { font-family: Georgia, serif; font-size: 22px; letter-spacing: -0.3px; margin-bottom: 16px; }
        .setting-label { font-size: 11px; font-weight: 700; letter-spacing: 0.08em; text-transform: uppercase; color: #AAA; margin-bottom: 8px; }
        .settings-row { display: flex; gap: 16px; margin-bottom: 18px; flex-wrap: wrap; }
        .setting-group { flex: 1; min-width: 220px; }
        .slider-wrap { display: flex; align-items: center; gap: 10px; }
        .slider { flex: 1; accent-color: #5B6AF0; }
        .slider-val { font-size: 13px; font-weight: 700; color: #5B6AF0; min-width: 20px; text-align: right; }
        .key-input { width: 100%; padding: 9px 12px; border: 1.5px solid #E8E4DD; border-radius: 10px; font-size: 13px; background: #FAFAF8; outline: none; }
        .key-input:focus { border-color: #5B6AF0; background: #fff; }
        .dropzone { border: 1.5px dashed #D0CAC0; border-radius: 14px; padding: 24px; text-align: center; cursor: pointer; transition: all 0.2s; background: #FAFAF8; margin-bottom: 14px; }
        .dropzone:hover, .dropzone.active { border-color: #5B6AF0; background: #F5F5FF; }
        .dropzone.locked { opacity: 0.5; cursor: not-allowed; border-color: #D0CAC0; background: #FAFAF8; }
        .dz-title { font-size: 14px; font-weight: 600; margin-bottom: 3px; }
        .dz-sub { font-size: 13px; color: #aaa; }
        .status { display: flex; align-items: center; gap: 8px; padding: 10px 14px; border-radius: 10px; font-size: 13px; font-weight: 500; margin-bottom: 14px; }
        .status.success { background: #F0FDF4; border: 1px solid #BBF7D0; color: #166534; }
        .status.error { background: #FFF5F5; border: 1px solid #FED7D7; color: #9B2C2C; }
        .status.info { background: #F5F5FF; border: 1px solid #C7D2FE; color: #3730A3; }
        .status.warn { background: #FFFBEB; border: 1px solid #FDE68A; color: #92400E; }
        .points { list-style: decimal; padding-left: 22px; font-size: 13.5px; line-height: 1.55; color: #444; display: flex; flex-direction: column; gap: 6px; max-height: 320px; overflow-y: auto; }
        .more { font-size: 12px; color: #aaa; margin-top: 8px; }
        .btn { width: 100%; padding: 13px; font-size: 15px; font-weight: 600; border: none; border-radius: 12px; cursor: pointer; transition: all 0.15s; }
        .btn-primary { background: #1a1a1a; color: #fff; }
        .btn-primary:hover:not(:disabled) { background: #2d2d2d; transform: translateY(-1px); }
        .btn-primary:disabled { opacity: 0.35; cursor: not-allowed; }
        .btn-secondary { background: #F0EDE8; color: #1a1a1a; }
        .prog-bar { height: 5px; background: #EDE9E2; border-radius: 99px; overflow: hidden; margin-bottom: 8px; }
        .prog-fill { height: 100%; background: #5B6AF0; border-radius: 99px; transition: width 0.4s ease; }
        .prog-label { font-size: 12px; font-weight: 600; color: #999; margin-bottom: 14px; }
        .q-block { padding: 16px 0; border-bottom: 1px solid #F7F5F0; }
        .q-num { font-family: Georgia, serif; font-size: 12px; font-style: italic; color: #5B6AF0; margin-bottom: 4px; }
        .q-text { font-size: 15px; font-weight: 500; line-height: 1.5; margin-bottom: 11px; }
        .options { display: flex; flex-direction: column; gap: 6px; }
        .opt { display: flex; align-items: flex-start; gap: 10px; padding: 10px 12px; border-radius: 9px; border: 1.5px solid #EDE9E2; font-size: 13.5px; color: #444; cursor: pointer; background: #FAFAF8; }
        .opt.selected { border-color: #5B6AF0; background: #F5F5FF; color: #3730A3; }
        .opt.disabled { cursor: default; }
        .metrics { display: flex; gap: 12px; margin-bottom: 18px; }
        .metric { flex: 1; padding: 14px; border-radius: 12px; background: #FAFAF8; border: 1px solid #EDE9E2; text-align: center; }
        .metric-val { font-size: 24px; font-weight: 700; }
        .metric-label { font-size: 11px; font-weight: 700; letter-spacing: 0.08em; text-transform: uppercase; color: #AAA; }
        .pct { font-family: Georgia, serif; font-size: 44px; text-align: center; margin: 8px 0 14px; }
        .wrong { padding: 14px; border-radius: 12px; border: 1px solid #FED7D7; background: #FFF5F5; margin-bottom: 10px; font-size: 13.5px; line-height: 1.55; }
        .wrong p { margin-bottom: 4px; }
        .explain { color: #3730A3; }
      `}</style>

      <div className="page">
        <div className="container">
          <div className="header">
            <h1 className="logo">Flash<em>Quiz</em></h1>
            <p className="tagline">Upload your study notes and test yourself with AI-generated questions.</p>
          </div>

          <div className="card">
            <div className="settings-row">
              <div className="setting-group">
                <div className="setting-label">Number of questions</div>
                <div className="slider-wrap">
                  <input className="slider" type="range" min={QUESTION_COUNT.min} max={QUESTION_COUNT.max}
                    value={questionCount} onChange={e => setQuestionCount(Number(e.target.value))} />
                  <span className="slider-val">{questionCount}</span>
                </div>
              </div>
              {!hasServerKey && (
                <div className="setting-group">
                  <div className="setting-label">OpenAI API key</div>
                  <input className="key-input" type="password" placeholder="sk-..." value={apiKey} onChange={e => setApiKey(e.target.value)} />
                </div>
              )}
            </div>

            <div
              className={`dropzone${dragOver ? " active" : ""}${generating ? " locked" : ""}`}
              onClick={() => { if (!generating) fileInputRef.current?.click(); }}
              onDragOver={e => { e.preventDefault(); if (!generating) setDragOver(true); }}
              onDragLeave={() => setDragOver(false)}
              onDrop={handleDrop}
            >
              <div className="dz-title">{uploading ? "Extracting text…" : upload ? upload.fileName : "Drop a PDF, DOCX or TXT file"}</div>
              <div className="dz-sub">{generating ? "Wait for the quiz to finish generating" : "or click to browse"}</div>
              <input ref={fileInputRef} type="file" accept=".pdf,.docx,.txt" hidden disabled={generating}
                onChange={e => { const f = e.target.files?.[0]; if (f) void processFile(f); }} />
            </div>

            {uploadStatus && <div className={`status ${uploadStatus.kind}`}>{uploadStatus.text}</div>}
          </div>

          {upload && preview && (
            <div className="card">
              <div className="card-title">Learning points</div>
              <ol className="points">
                {preview.shown.map((p, i) => <li key={i}>{p}</li>)}
              </ol>
              {preview.remaining > 0 && <div className="more">… and {preview.remaining} more</div>}
              <div style={{ marginTop: 18 }}>
                {!canGenerate && <div className="status error">Please enter an OpenAI API key to generate a quiz.</div>}
                {generating && (
                  <>
                    <div className="prog-bar"><div className="prog-fill" style={{ width: `${progress.total ? (progress.current / progress.total) * 100 : 0}%` }} /></div>
                    <div className="prog-label">Generating question {Math.min(progress.current + 1, progress.total)}/{progress.total}…</div>
                  </>
                )}
                {genStatus && <div className={`status ${genStatus.kind}`}>{genStatus.text}</div>}
                <button className="btn btn-primary" disabled={!canGenerate || generating} onClick={() => void generateQuiz()}>
                  {generating ? "Generating…" : "Generate quiz"}
                </button>
              </div>
            </div>
          )}

          {session.mcqs.length > 0 && (
            <div className="card" key={session.id}>
              <div className="card-title">Quiz</div>
              <div className="prog-label">{answeredCount}/{session.mcqs.length} answered</div>
              {session.mcqs.map((q, qi) => (
                <div className="q-block" key={qi}>
                  <div className="q-num">Question {qi + 1}</div>
                  <div className="q-text">{q.question}</div>
                  <div className="options">
                    {q.options.map(opt => (
                      <label key={opt} className={`opt${session.userAnswers[qi] === opt ? " selected" : ""}${session.submitted ? " disabled" : ""}`}>
                        <input type="radio" name={`q_${qi}`} checked={session.userAnswers[qi] === opt}
                          disabled={session.submitted} onChange={() => selectOption(qi, opt)} />
                        {opt}
                      </label>
                    ))}
                  </div>
                </div>
              ))}
              {!session.submitted && (
                <div style={{ marginTop: 18 }}>
                  {submitStatus && <div className={`status ${submitStatus.kind}`}>{submitStatus.text}</div>}
                  <button className="btn btn-primary" disabled={grading} onClick={() => void submitQuiz()}>
                    {grading ? "Grading…" : "Submit quiz"}
                  </button>
                </div>
              )}
            </div>
          )}

          {report && tier && (
            <div className="card">
              <div className="card-title">Results</div>
              <div className="metrics">
                <div className="metric"><div className="metric-val">{report.total}</div><div className="metric-label">Total</div></div>
                <div className="metric"><div className="metric-val">{report.correct}</div><div className="metric-label">Correct</div></div>
                <div className="metric"><div className="metric-val">{report.wrong}</div><div className="metric-label">Wrong</div></div>
              </div>
              <div className="prog-bar"><div className="prog-fill" style={{ width: `${report.percentage}%` }} /></div>
              <div className="pct">{report.percentage}%</div>
              <div className={`status ${tier === "excellent" ? "success" : tier === "good" ? "info" : "warn"}`}>{TIER_MESSAGES[tier]}</div>

              {report.wrong_questions.length > 0 ? (
                <>
                  <div className="setting-label" style={{ marginTop: 8 }}>Review your mistakes</div>
                  {report.wrong_questions.map(w => (
                    <div className="wrong" key={w.question_num}>
                      <p><strong>Question {w.question_num}:</strong> {w.question}</p>
                      <p><strong>Your answer:</strong> {w.user_answer}</p>
                      <p><strong>Correct answer:</strong> {w.correct_answer}</p>
                      {w.explanation !== NO_EXPLANATION && <p className="explain"><strong>Explanation:</strong> {w.explanation}</p>}
                    </div>
                  ))}
                </>
              ) : (
                <div className="status success">Perfect score! You didn&apos;t miss any questions!</div>
              )}

              <button className="btn btn-secondary" onClick={startNewQuiz}>Start new quiz</button>
            </div>
          )}
        </div>
      </div>
    </>
  );
}
