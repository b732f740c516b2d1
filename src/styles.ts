export const STYLES = `
* { box-sizing: border-box; }
body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
  margin: 0;
  background: #F9FAFB;
  color: #161616;
}
.app-header {
  display: flex;
  align-items: center;
  justify-content: space-between;
  padding: 16px 32px;
  background: white;
  border-bottom: 1px solid #E5E7EB;
}
.app-title { font-size: 20px; margin: 0; }
.account { display: flex; align-items: center; gap: 12px; font-size: 14px; color: #6B7280; }
.plan-label { padding: 2px 8px; border-radius: 999px; background: #EEF2FF; color: #4338CA; }
main { max-width: 880px; margin: 32px auto; padding: 0 16px; }
.card {
  background: white;
  border-radius: 12px;
  box-shadow: 0 4px 6px rgba(0, 0, 0, 0.1);
  padding: 32px;
  margin-bottom: 24px;
}
.notice { padding: 12px 16px; border-radius: 8px; margin-bottom: 24px; }
.notice-error { background: #FEF2F2; color: #DC2626; }
.notice-info { background: #EFF6FF; color: #1D4ED8; }
.notice-success { background: #ECFDF5; color: #047857; }
label { display: block; font-weight: 600; margin: 16px 0 6px; }
input[type=text], input[type=email], textarea, select {
  width: 100%;
  padding: 10px 12px;
  border: 1px solid #D1D5DB;
  border-radius: 8px;
  font: inherit;
}
textarea { min-height: 200px; resize: vertical; }
button {
  margin-top: 20px;
  padding: 10px 20px;
  border: none;
  border-radius: 8px;
  background: #161616;
  color: white;
  font: inherit;
  cursor: pointer;
}
button[disabled] { background: #9CA3AF; cursor: not-allowed; }
button.link-button { background: none; color: #6B7280; margin: 0; padding: 0; text-decoration: underline; }
.plans { display: grid; grid-template-columns: repeat(auto-fit, minmax(260px, 1fr)); gap: 24px; }
.plan-price { font-size: 28px; font-weight: 700; margin: 8px 0 16px; }
.plan-features { padding-left: 20px; color: #6B7280; line-height: 1.6; }
.job-status { display: flex; align-items: center; gap: 12px; }
.spinner {
  width: 18px;
  height: 18px;
  border: 3px solid #E5E7EB;
  border-top-color: #161616;
  border-radius: 50%;
  animation: spin 1s linear infinite;
}
@keyframes spin { to { transform: rotate(360deg); } }
.result-image { max-width: 100%; border: 1px solid #E5E7EB; border-radius: 8px; margin-top: 16px; }
.small-text { font-size: 13px; color: #9CA3AF; }
`;
