import mongoose, { Schema, type Document } from 'mongoose';
import type { QuestionDifficulty } from './types';

export interface IQuestion extends Document {
  questionId: string;
  prompt: string;
  difficulty: QuestionDifficulty;
  topicHints: string[];
  category: string;
  isActive: boolean;
}

const QuestionSchema: Schema = new Schema(
  {
    questionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    prompt: {
      type: String,
      required: true,
    },
    difficulty: {
      type: String,
      enum: ['Easy', 'Medium', 'Hard'],
      required: true,
    },
    topicHints: [{
      type: String,
    }],
    category: {
      type: String,
      default: 'General',
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<IQuestion>('Question', QuestionSchema);
