/** How the client authenticates to GitHub. */
export type GitHubAuth =
  | { kind: "token"; token: string }
  | {
      kind: "app";
      appId: number;
      installationId: number;
      /** PEM text of the app's private key */
      privateKey: string;
      /** The app is registered on the enterprise host rather than github.com. */
      enterpriseOnly: boolean;
    };
