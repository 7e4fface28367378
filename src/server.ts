import { loadConfig } from "./config";
import { createApp } from "./app";
import { createSupabaseAdmin } from "./supabaseClient";
import { SupabaseNoteRepository } from "./db/noteRepository";
import { NoteService } from "./services/noteService";
import { QuizService } from "./services/quizService";
import {
  OpenAICompletionModel,
  createOpenAIClient,
} from "./OpenAI/openaiClient";

const config = loadConfig();

const noteRepository = new SupabaseNoteRepository(createSupabaseAdmin(config));
const completionModel = new OpenAICompletionModel(
  createOpenAIClient(config),
  config.openaiModel
);

console.log(
  `[INFO] Initializing QuizService with OpenAI model ${config.openaiModel}`
);

const app = createApp({
  noteService: new NoteService(noteRepository),
  quizService: new QuizService({ notes: noteRepository, model: completionModel }),
  nodeEnv: config.nodeEnv,
  corsOrigins: config.corsOrigins,
});

app.listen(config.port, () => {
  console.log(`Server listening on port ${config.port}`);
});
