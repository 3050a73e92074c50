import { DAY_LABEL_PREFIX } from "./constants";
import type { Course, Lang, Translations } from "./types";

const I18N: Record<Lang, Translations> = {
  en: {
    appTitle: "Exam Scheduling via Welsh-Powell",
    inputParameters: "Input Parameters",
    studentCount: "Number of students",
    student: "Student",
    selectCourses: "Select courses",
    display: "Display",
    fontSize: "Font size",
    dayColors: "Day colors",
    language: "Language",
    english: "English",
    arabic: "العربية",
    saveSettings: "Save settings",
    resetSettings: "Restore defaults",
    settingsSaved: "Display settings saved.",
    settingsReset: "Display settings restored to defaults.",
    minimumDays: "Minimum Required Days",
    conflictEdges: "Conflicting course pairs",
    noConflictEdges: "No two selected courses share a student.",
    scheduleByDay: "Course Schedule by Day",
    editor: "Interactive Schedule Editor",
    editorHint: "Manually adjust the schedule below. Note: a course can only be scheduled for one day.",
    addRow: "Add row",
    removeRow: "Remove",
    applyChanges: "Apply Changes",
    resetChanges: "Reset Changes",
    validate: "Validate Schedule",
    exportCsv: "Export Schedule as CSV",
    changesApplied: "Changes applied!",
    changesReset: "Schedule reset to original version.",
    validationFailed: "Schedule Validation Failed",
    validationPassed: "Schedule is valid! No conflicts detected.",
    exportRejected: "Validate the schedule without conflicts before exporting.",
    exported: "Schedule exported.",
    formatError: "The schedule could not be read",
    multiDayHeading: "Courses scheduled on multiple days:",
    studentConflictHeading: "Student scheduling conflicts:",
    fixHint: "Please fix the highlighted conflicts by moving courses to different days.",
    multiDayLine: "{course} is scheduled on {days}",
    studentConflictLine: "{student} has multiple exams on {day}: {courses}",
    noCourses: "Select courses for at least one student to build a schedule.",
  },
  ar: {
    appTitle: "جدولة الاختبارات بخوارزمية ويلش-باول",
    inputParameters: "المدخلات",
    studentCount: "عدد الطلاب",
    student: "الطالب",
    selectCourses: "اختر المقررات",
    display: "العرض",
    fontSize: "حجم الخط",
    dayColors: "ألوان الأيام",
    language: "اللغة",
    english: "English",
    arabic: "العربية",
    saveSettings: "حفظ الإعدادات",
    resetSettings: "استعادة الافتراضي",
    settingsSaved: "تم حفظ إعدادات العرض.",
    settingsReset: "تمت استعادة إعدادات العرض الافتراضية.",
    minimumDays: "أقل عدد أيام مطلوب",
    conflictEdges: "أزواج المقررات المتعارضة",
    noConflictEdges: "لا يشترك أي مقررين مختارين في طالب.",
    scheduleByDay: "جدول المقررات حسب اليوم",
    editor: "محرر الجدول",
    editorHint: "عدّل الجدول يدويًا. ملاحظة: لا يُجدول المقرر إلا في يوم واحد.",
    addRow: "إضافة صف",
    removeRow: "حذف",
    applyChanges: "تطبيق التغييرات",
    resetChanges: "التراجع عن التغييرات",
    validate: "التحقق من الجدول",
    exportCsv: "تصدير الجدول CSV",
    changesApplied: "تم تطبيق التغييرات!",
    changesReset: "تمت إعادة الجدول إلى نسخته الأصلية.",
    validationFailed: "فشل التحقق من الجدول",
    validationPassed: "الجدول صالح! لا توجد تعارضات.",
    exportRejected: "تحقق من خلو الجدول من التعارضات قبل التصدير.",
    exported: "تم تصدير الجدول.",
    formatError: "تعذرت قراءة الجدول",
    multiDayHeading: "مقررات مجدولة في أكثر من يوم:",
    studentConflictHeading: "تعارضات الطلاب:",
    fixHint: "يرجى إصلاح التعارضات المظللة بنقل المقررات إلى أيام أخرى.",
    multiDayLine: "{course} مجدول في {days}",
    studentConflictLine: "{student} لديه أكثر من اختبار في {day}: {courses}",
    noCourses: "اختر مقررات لطالب واحد على الأقل لبناء الجدول.",
  },
};

const DAY_WORD: Record<Lang, string> = {
  en: DAY_LABEL_PREFIX,
  ar: "اليوم",
};

const LIST_SEPARATOR: Record<Lang, string> = {
  en: ", ",
  ar: "، ",
};

export function getT(lang: Lang) {
  return I18N[lang] || I18N.en;
}

function langOf(t: Translations): Lang {
  return t === I18N.ar ? "ar" : "en";
}

export function fillTemplate(template: string, values: Record<string, string | number>) {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => (key in values ? String(values[key]) : match));
}

export function formatDayNumber(lang: Lang, day: number) {
  return `${DAY_WORD[lang]} ${day}`;
}

/** Localizes a "Day n" column label; anything else is shown as typed. */
export function formatDayLabel(lang: Lang, label: string) {
  const match = new RegExp(`^${DAY_LABEL_PREFIX}\\s+(\\d+)$`, "i").exec(label.trim());
  if (!match) return label;
  return formatDayNumber(lang, Number.parseInt(match[1], 10));
}

export function localizeStudentName(lang: Lang, name: string) {
  if (lang !== "ar") return name;
  return name.replace(/^Student\s+/, `${I18N.ar.student} `);
}

export function describeMultiDay(t: Translations, course: Course, days: number[]) {
  const lang = langOf(t);
  return fillTemplate(t.multiDayLine, {
    course,
    days: days.map((day) => formatDayNumber(lang, day)).join(LIST_SEPARATOR[lang]),
  });
}

export function describeStudentConflict(t: Translations, student: string, day: number, courses: Course[]) {
  const lang = langOf(t);
  return fillTemplate(t.studentConflictLine, {
    student: localizeStudentName(lang, student),
    day: formatDayNumber(lang, day),
    courses: courses.join(LIST_SEPARATOR[lang]),
  });
}
