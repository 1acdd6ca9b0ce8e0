import { z } from 'zod';

export const Specialization = {
  WholeClass: 1,
  GroupA: 2,
  GroupB: 3,
} as const;

export type Specialization =
  (typeof Specialization)[keyof typeof Specialization];

export const specializationSchema = z.union([
  z.literal(Specialization.WholeClass),
  z.literal(Specialization.GroupA),
  z.literal(Specialization.GroupB),
]);

export const lessonEntrySchema = z.object({
  subject: z.string().min(1),
  teacher: z.string().min(1),
  room: z.string().min(1),
  specialization: specializationSchema,
});

export type LessonEntry = z.infer<typeof lessonEntrySchema>;

const hourSlotSchema = z.string().regex(/^\d{1,2}$/, 'Expected hour number');

export const timetableSchema = z.record(
  z.string().min(1),
  z.record(hourSlotSchema, z.array(lessonEntrySchema)),
);

// weekday -> hour -> entries; a blank slot is [] rather than absent
export type Timetable = z.infer<typeof timetableSchema>;

export const timetableResponseSchema = z.object({
  class: z.string().min(1).nullable(),
  timetable: timetableSchema,
});

export type TimetableResponse = z.infer<typeof timetableResponseSchema>;

export type Orientation = 'weekdays-in-row' | 'weekdays-in-column';

export type ExtractedTimetable = {
  className: string | null;
  timetable: Timetable;
  orientation: Orientation;
};
