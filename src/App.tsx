import { useEffect, useMemo, useState } from "react";
import { COURSES, MAX_STUDENTS, MIN_STUDENTS } from "./domain/constants";
import {
  MAX_FONT_SIZE,
  MIN_FONT_SIZE,
  colorForDay,
  getDefaultDisplayConfig,
  loadDisplayConfig,
  saveDisplayConfig,
  setDayColor,
  validateDisplayConfig,
  type DisplayConfig,
} from "./domain/displayConfig";
import { FormatError } from "./domain/errors";
import { EXPORT_FILE_NAME, exportScheduleCsv } from "./domain/exportCsv";
import { conflictEdges } from "./domain/graph";
import { describeMultiDay, describeStudentConflict, formatDayLabel, formatDayNumber, getT, localizeStudentName } from "./domain/i18n";
import { collectEnrollments, planSchedule, resizeSelections, studentName, toggleSelection, type StudentSelections } from "./domain/planner";
import { addGridRow, cloneGrid, gridsEqual, normalizeGrid, removeGridRow, setGridCell } from "./domain/schedule";
import type { Lang, ScheduleGrid } from "./domain/types";
import { currentViolations, hasViolations, snapshotValidation, violatingCourses, type ValidationSnapshot } from "./domain/validator";
import "./styles/app.css";

function cx(...parts: Array<string | boolean | null | undefined>) {
  return parts.filter(Boolean).join(" ");
}

function toInt(value: string, fallback: number) {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n)) return fallback;
  return n;
}

function downloadCsv(csv: string) {
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = EXPORT_FILE_NAME;
  link.click();
  URL.revokeObjectURL(url);
}

function GridTable({ grid, config, lang }: { grid: ScheduleGrid; config: DisplayConfig; lang: Lang }) {
  return (
    <table className="grid-table" style={{ fontSize: config.fontSize + 4 }}>
      <thead>
        <tr>
          {grid.columns.map((label, column) => (
            <th key={label} style={{ background: colorForDay(config, column) }}>
              {formatDayLabel(lang, label)}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {grid.rows.map((row, rowIndex) => (
          <tr key={rowIndex}>
            {grid.columns.map((label, column) => (
              <td key={label}>{row[column] ?? ""}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export default function App() {
  const [config, setConfig] = useState<DisplayConfig>(() => loadDisplayConfig());
  const t = getT(config.lang);
  const dir = config.lang === "ar" ? "rtl" : "ltr";

  const [selections, setSelections] = useState<StudentSelections>(() => resizeSelections([], config.studentCount));
  const { enrollments, errors: selectionErrors } = useMemo(() => collectEnrollments(selections), [selections]);
  const plan = useMemo(() => planSchedule(COURSES, enrollments), [enrollments]);
  const edges = useMemo(() => conflictEdges(plan.graph), [plan]);

  const [originalGrid, setOriginalGrid] = useState<ScheduleGrid>(plan.grid);
  const [editedGrid, setEditedGrid] = useState<ScheduleGrid>(() => cloneGrid(plan.grid));
  const [validation, setValidation] = useState<ValidationSnapshot | null>(null);
  const [formatError, setFormatError] = useState<string | null>(null);
  const [notice, setNotice] = useState("");

  const configValidation = useMemo(() => validateDisplayConfig(config, plan.dayCount), [config, plan.dayCount]);
  const violations = useMemo(() => currentViolations(validation, editedGrid, enrollments), [validation, editedGrid, enrollments]);
  const highlight = useMemo(() => (violations ? violatingCourses(violations) : new Set<string>()), [violations]);
  const isValidated = violations !== null && !hasViolations(violations);

  useEffect(() => {
    if (gridsEqual(originalGrid, plan.grid)) return;
    setOriginalGrid(plan.grid);
    setEditedGrid(cloneGrid(plan.grid));
    setValidation(null);
    setFormatError(null);
  }, [plan, originalGrid]);

  const clearValidation = () => {
    setValidation(null);
    setFormatError(null);
  };

  const setStudentCount = (value: string) => {
    const studentCount = Math.max(MIN_STUDENTS, Math.min(MAX_STUDENTS, toInt(value, config.studentCount)));
    setConfig((prev) => ({ ...prev, studentCount }));
    setSelections((prev) => resizeSelections(prev, studentCount));
  };

  const editCell = (row: number, column: number, value: string) => {
    setEditedGrid((prev) => setGridCell(prev, row, column, value));
    clearValidation();
  };

  const applyChanges = () => {
    setEditedGrid((prev) => normalizeGrid(prev));
    clearValidation();
    setNotice(t.changesApplied);
  };

  const resetChanges = () => {
    setEditedGrid(cloneGrid(originalGrid));
    clearValidation();
    setNotice(t.changesReset);
  };

  const validate = () => {
    try {
      const snapshot = snapshotValidation(editedGrid, enrollments);
      setValidation(snapshot);
      setFormatError(null);
      setNotice(hasViolations(snapshot.violations) ? "" : t.validationPassed);
    } catch (error) {
      if (!(error instanceof FormatError)) throw error;
      setValidation(null);
      setFormatError(error.message);
      setNotice("");
    }
  };

  const exportSchedule = () => {
    const csv = exportScheduleCsv(editedGrid, violations);
    if (csv === null) {
      setNotice(t.exportRejected);
      return;
    }
    downloadCsv(csv);
    setNotice(t.exported);
  };

  const saveSettings = () => {
    if (configValidation.errors.length > 0) return;
    saveDisplayConfig(config);
    setNotice(t.settingsSaved);
  };

  const resetSettings = () => {
    const defaults = getDefaultDisplayConfig();
    setConfig(defaults);
    setSelections((prev) => resizeSelections(prev, defaults.studentCount));
    saveDisplayConfig(defaults);
    setNotice(t.settingsReset);
  };

  return (
    <div className="planner-shell" dir={dir} style={{ fontSize: config.fontSize + 4 }}>
      <aside className="planner-sidebar">
        <h2>{t.inputParameters}</h2>
        <label>
          {t.studentCount}
          <input type="number" min={MIN_STUDENTS} max={MAX_STUDENTS} step={1} value={config.studentCount} onChange={(event) => setStudentCount(event.target.value)} />
        </label>

        {selections.map((selected, studentIndex) => (
          <fieldset key={studentIndex} className="student-block">
            <legend>
              {localizeStudentName(config.lang, studentName(studentIndex))} · {t.selectCourses}
            </legend>
            <div className="course-options">
              {COURSES.map((course) => (
                <label key={course} className="course-option">
                  <input
                    type="checkbox"
                    checked={selected.includes(course)}
                    onChange={() => setSelections((prev) => toggleSelection(prev, studentIndex, course))}
                  />
                  {course}
                </label>
              ))}
            </div>
          </fieldset>
        ))}

        {selectionErrors.length > 0 ? (
          <ul className="planner-errors">
            {selectionErrors.map((item) => (
              <li key={item}>{item}</li>
            ))}
          </ul>
        ) : null}

        <h2>{t.display}</h2>
        <label>
          {t.language}
          <select value={config.lang} onChange={(event) => setConfig((prev) => ({ ...prev, lang: event.target.value === "ar" ? "ar" : "en" }))}>
            <option value="en">{t.english}</option>
            <option value="ar">{t.arabic}</option>
          </select>
        </label>
        <label>
          {t.fontSize}: {config.fontSize}
          <input
            type="range"
            min={MIN_FONT_SIZE}
            max={MAX_FONT_SIZE}
            value={config.fontSize}
            onChange={(event) => setConfig((prev) => ({ ...prev, fontSize: toInt(event.target.value, prev.fontSize) }))}
          />
        </label>

        <h3>{t.dayColors}</h3>
        <div className="day-colors">
          {Array.from({ length: plan.dayCount }, (_, dayIndex) => (
            <label key={dayIndex}>
              {formatDayNumber(config.lang, dayIndex + 1)}
              <input type="color" value={colorForDay(config, dayIndex)} onChange={(event) => setConfig((prev) => setDayColor(prev, dayIndex, event.target.value))} />
            </label>
          ))}
        </div>

        {[...configValidation.errors, ...configValidation.warnings].map((item) => (
          <div key={item} className="hint">
            {item}
          </div>
        ))}

        <div className="button-row">
          <button className="secondary" type="button" onClick={resetSettings}>
            {t.resetSettings}
          </button>
          <button className="primary" type="button" onClick={saveSettings} disabled={configValidation.errors.length > 0}>
            {t.saveSettings}
          </button>
        </div>
      </aside>

      <main className="planner-main">
        <h1>{t.appTitle}</h1>

        <div className="day-count-banner">
          {t.minimumDays}: {plan.dayCount}
        </div>

        {Object.keys(enrollments).length === 0 ? <p className="hint">{t.noCourses}</p> : null}

        <section className="planner-card">
          <h2>{t.conflictEdges}</h2>
          {edges.length > 0 ? (
            <ul className="edge-list">
              {edges.map(([a, b]) => (
                <li key={`${a}|${b}`}>
                  {a} ↔ {b}
                </li>
              ))}
            </ul>
          ) : (
            <p className="hint">{t.noConflictEdges}</p>
          )}
        </section>

        <section className="planner-card">
          <h2>{t.scheduleByDay}</h2>
          <GridTable grid={plan.grid} config={config} lang={config.lang} />
        </section>

        <section className="planner-card">
          <h2>{t.editor}</h2>
          <p className="hint">{t.editorHint}</p>

          {formatError ? (
            <div className="planner-failure">
              <strong>{t.formatError}:</strong> {formatError}
            </div>
          ) : null}

          {violations && hasViolations(violations) ? (
            <div className="planner-failure">
              <strong>{t.validationFailed}</strong>
              {Object.keys(violations.multiDay).length > 0 ? (
                <>
                  <p>{t.multiDayHeading}</p>
                  <ul>
                    {Object.entries(violations.multiDay).map(([course, days]) => (
                      <li key={course}>{describeMultiDay(t, course, days)}</li>
                    ))}
                  </ul>
                </>
              ) : null}
              {Object.keys(violations.studentConflicts).length > 0 ? (
                <>
                  <p>{t.studentConflictHeading}</p>
                  <ul>
                    {Object.entries(violations.studentConflicts).flatMap(([student, perDay]) =>
                      Object.entries(perDay).map(([day, courses]) => (
                        <li key={`${student}|${day}`}>{describeStudentConflict(t, student, Number(day), courses)}</li>
                      ))
                    )}
                  </ul>
                </>
              ) : null}
              <p className="hint">{t.fixHint}</p>
            </div>
          ) : null}

          <table className="grid-table editor">
            <thead>
              <tr>
                {editedGrid.columns.map((label, column) => (
                  <th key={label} style={{ background: colorForDay(config, column) }}>
                    {formatDayLabel(config.lang, label)}
                  </th>
                ))}
                <th />
              </tr>
            </thead>
            <tbody>
              {editedGrid.rows.map((row, rowIndex) => (
                <tr key={rowIndex}>
                  {editedGrid.columns.map((label, column) => {
                    const value = row[column] ?? "";
                    return (
                      <td key={label} className={cx(highlight.has(value) && "conflict")}>
                        <input value={value} onChange={(event) => editCell(rowIndex, column, event.target.value)} />
                      </td>
                    );
                  })}
                  <td>
                    <button
                      className="secondary"
                      type="button"
                      onClick={() => {
                        setEditedGrid((prev) => removeGridRow(prev, rowIndex));
                        clearValidation();
                      }}
                    >
                      {t.removeRow}
                    </button>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>

          <div className="button-row">
            <button
              className="secondary"
              type="button"
              onClick={() => {
                setEditedGrid((prev) => addGridRow(prev));
                clearValidation();
              }}
            >
              {t.addRow}
            </button>
            <button className="primary" type="button" onClick={applyChanges}>
              {t.applyChanges}
            </button>
            <button className="secondary" type="button" onClick={resetChanges}>
              {t.resetChanges}
            </button>
            <button className="secondary" type="button" onClick={validate}>
              {t.validate}
            </button>
            {isValidated ? (
              <button className="primary" type="button" onClick={exportSchedule}>
                {t.exportCsv}
              </button>
            ) : null}
          </div>
        </section>

        {notice ? <div className="planner-notice">{notice}</div> : null}
      </main>
    </div>
  );
}
