import * as React from 'react';

interface LoginFormProps {
  email?: string;
}

export const LoginForm: React.FC<LoginFormProps> = ({ email }) => {
  return (
    <section className="card login-card">
      <h2>Publication-ready method diagrams</h2>
      <p>Paste the method section of your paper and get a clean diagram back.</p>

      <form method="post" action="/api/auth?action=login">
        <label htmlFor="email">Email</label>
        <input id="email" name="email" type="email" defaultValue={email} placeholder="you@university.edu" required />
        <button type="submit">Continue</button>
      </form>

      <p className="small-text">We only use your email to find your subscription.</p>
    </section>
  );
};
