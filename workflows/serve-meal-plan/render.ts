import { formatWeekdayDate } from "utils/dates";
// Types
import type { DayView, EveningPrep, PageView } from "./view";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const capitalize = (value: string): string =>
  value ? value.charAt(0).toUpperCase() + value.slice(1) : value;

const renderEveningPrep = (prep: EveningPrep): string => {
  switch (prep.kind) {
    case "prep":
      return `<p><strong>Evening Prep:</strong> ${escapeHtml(prep.items.join(", "))}</p>`;
    case "none":
      return "<p><strong>Evening Prep:</strong> No prep</p>";
    case "end-of-plan":
      return "<p><strong>Evening Prep:</strong> No prep (end of plan).</p>";
  }
};

export const renderDay = (day: DayView, emptyMessage: string): string => {
  if (!day.meals.length) {
    return `<p class="warning">⚠️ ${escapeHtml(emptyMessage)}</p>`;
  }

  const meals = day.meals
    .map(
      (meal) =>
        `<li><strong>${escapeHtml(capitalize(meal.mealType) || "Meal")}:</strong> ${escapeHtml(meal.item || "N/A")}` +
        `<br><em>Method:</em> ${escapeHtml(meal.method || "N/A")}</li>`
    )
    .join("");

  return `<ul>${meals}</ul>${renderEveningPrep(day.eveningPrep)}`;
};

const renderResult = (view: PageView): string => {
  if (!view.result) return "";
  const icon = view.result.status === "success" ? "✅" : view.result.status === "warning" ? "⚠️" : "❌";
  return `<p class="${view.result.status}">${icon} ${escapeHtml(view.result.message)}</p>`;
};

export const renderPage = (view: PageView): string => {
  const sections = [
    "<h1>🥗 Vegetarian Meal &amp; Prep Planner</h1>",
    renderResult(view),
    `<form method="post" action="/generate">
  <label for="preferences">Enter your meal preferences:</label>
  <textarea id="preferences" name="preferences" rows="4" placeholder="e.g., No sugar, high protein, includes sprouts and poha">${escapeHtml(view.preferences)}</textarea>
  <button type="submit">Generate Monthly Plan</button>
</form>`,
  ];

  if (view.hasPlan) {
    sections.push(
      `<h2>📌 Today's Plan (${escapeHtml(formatWeekdayDate(view.today.date))})</h2>`,
      renderDay(view.today, "No plan found for today. Generate a plan above."),
      "<h2>📅 Check another day</h2>",
      `<form method="get" action="/">
  <input type="date" name="date" value="${view.selected.isoDate}">
  <button type="submit">Show</button>
</form>`,
      renderDay(view.selected, "No plan found for the selected date.")
    );
  } else {
    sections.push('<p class="warning">⚠️ No meal plan stored yet. Generate a plan above.</p>');
  }

  return `<!doctype html>
<html lang="en">
<head><meta charset="utf-8"><title>Vegetarian Meal Planner</title></head>
<body>
${sections.filter(Boolean).join("\n")}
</body>
</html>`;
};
