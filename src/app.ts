import express from "express";
import cors from "cors";
import type { NoteService } from "./services/noteService";
import type { QuizService } from "./services/quizService";
import { createNoteRouter } from "./routes/noteRoutes";
import { createQuizRouter } from "./routes/quizRoutes";
import { jsonErrors } from "./middleware/jsonErrors";

export type AppDeps = {
  noteService: NoteService;
  quizService: QuizService;
  nodeEnv?: string;
  corsOrigins?: string[];
};

export const createApp = ({
  noteService,
  quizService,
  nodeEnv = "development",
  corsOrigins = [],
}: AppDeps) => {
  const app = express();

  if (nodeEnv !== "production" && corsOrigins.length > 0) {
    app.use(
      cors({
        origin: corsOrigins,
        credentials: true,
      })
    );
  }

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });
  app.set("trust proxy", 1);

  app.use(express.json());

  // Registered before the note router so "generate-quiz" is never read as :id.
  app.use("/notes", createQuizRouter(quizService));
  app.use("/notes", createNoteRouter(noteService));

  app.use(jsonErrors);

  return app;
};
